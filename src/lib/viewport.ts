export type ScrollDirection = 1 | -1;

export const DEFAULT_SCROLL_PADDING = 3;

/**
 * Selection and scroll position over a list of items that may each take
 * more than one display row.
 *
 * `offset` is the index of the item drawn at the top of the window and
 * `height` the number of rows the window has.
 */
export class Viewport {
  selected = 0;
  offset = 0;
  height = 0;
  private heights: number[] = [];

  constructor(readonly scrollPadding = DEFAULT_SCROLL_PADDING) {}

  get itemCount(): number {
    return this.heights.length;
  }

  /**
   * Replace the item heights after a flatten. Selection and offset are
   * clamped; callers re-select by flat index afterwards.
   */
  setItems(heights: readonly number[]): void {
    this.heights = [...heights];
    const last = Math.max(0, this.heights.length - 1);
    this.selected = Math.min(this.selected, last);
    this.offset = Math.min(this.offset, this.selected);
  }

  setHeight(rows: number): void {
    this.height = Math.max(0, rows);
    this.keepSelectionInView();
  }

  /**
   * Rows taken by the items in [from, to).
   */
  rowsBetween(from: number, to: number): number {
    let rows = 0;
    for (let i = Math.max(0, from); i < Math.min(to, this.heights.length); i++) {
      rows += this.heights[i];
    }
    return rows;
  }

  /**
   * Walk from `start` item by item, adding up the rows passed, until the
   * total exceeds `distance` or the first/last item is reached. Returns the
   * item the walk stopped on.
   */
  walk(start: number, direction: ScrollDirection, distance: number): number {
    let index = start;
    let travelled = 0;

    if (direction === 1) {
      while (index < this.heights.length - 1) {
        travelled += this.heights[index];
        if (travelled > distance) break;
        index++;
      }
    } else {
      while (index > 0) {
        travelled += this.heights[index - 1];
        if (travelled > distance) break;
        index--;
      }
    }

    return index;
  }

  select(index: number): void {
    if (this.itemCount === 0) {
      this.selected = 0;
      this.offset = 0;
      return;
    }
    this.selected = Math.min(Math.max(index, 0), this.itemCount - 1);
    this.keepSelectionInView();
  }

  selectNext(): void {
    this.select(this.selected + 1);
  }

  selectPrev(): void {
    this.select(this.selected - 1);
  }

  /**
   * Mouse wheel down: move the window one item; drag the selection along
   * when it would enter the top padding band. A tick moves by one item, which
   * is more than one row when the top item spans several rows.
   */
  scrollDown(): void {
    if (this.offset >= this.itemCount - 1) return;
    this.offset++;

    const wanted = Math.min(this.scrollPadding, this.rowsBetween(0, this.selected));
    if (
      this.selected < this.offset ||
      this.rowsBetween(this.offset, this.selected) < wanted
    ) {
      this.selected = Math.min(this.selected + 1, this.itemCount - 1);
    }
    this.selected = Math.max(this.selected, this.offset);
  }

  /**
   * Mouse wheel up: the mirror of `scrollDown`, against the bottom edge.
   */
  scrollUp(): void {
    if (this.offset === 0) return;
    this.offset--;

    if (this.height === 0) return;
    const wanted = Math.min(
      this.scrollPadding,
      this.rowsBetween(this.selected + 1, this.itemCount),
    );
    if (this.rowsBelowSelection() < wanted) {
      this.selected = Math.max(this.selected - 1, 0);
    }
    while (this.selected > this.offset && this.rowsBelowSelection() < 0) {
      this.selected--;
    }
  }

  pageDown(): void {
    if (this.itemCount === 0) return;
    const selectionRows = this.selectionRows();
    const target = this.walk(this.offset, 1, this.height);

    if (target === this.itemCount - 1) {
      // The window stays put when the last item fits in it, otherwise it
      // moves just far enough to show that item.
      this.selected = target;
      if (this.rowsBelowSelection() < 0) {
        this.keepSelectionInView();
      }
      return;
    }

    this.offset = target;
    this.selected = this.walk(this.offset, 1, selectionRows);
  }

  pageUp(): void {
    if (this.itemCount === 0) return;
    const selectionRows = this.selectionRows();
    const target = this.walk(this.offset, -1, this.height);

    if (target === 0 && this.offset === 0) {
      this.selected = 0;
      return;
    }

    this.offset = target;
    this.selected = this.walk(this.offset, 1, selectionRows);
  }

  /**
   * Item under a row of the list area (0 is the top row).
   */
  itemAtRow(row: number): number {
    return this.walk(this.offset, 1, Math.max(0, row));
  }

  click(row: number): void {
    if (this.itemCount === 0) return;
    this.selected = this.itemAtRow(row);
  }

  /**
   * Indices of the items drawn in the window, top to bottom.
   */
  visibleItems(): number[] {
    const visible: number[] = [];
    let rows = 0;
    for (let i = this.offset; i < this.itemCount && rows < this.height; i++) {
      visible.push(i);
      rows += this.heights[i];
    }
    return visible;
  }

  private selectionRows(): number {
    return this.selected >= this.offset
      ? this.rowsBetween(this.offset, this.selected)
      : 0;
  }

  private rowsBelowSelection(): number {
    return (
      this.height -
      this.rowsBetween(this.offset, this.selected) -
      this.heights[this.selected]
    );
  }

  private keepSelectionInView(): void {
    if (this.itemCount === 0) return;

    if (this.height > 0) {
      const below = Math.min(
        this.scrollPadding,
        this.rowsBetween(this.selected + 1, this.itemCount),
      );
      if (this.rowsBelowSelection() < below) {
        const room = Math.max(
          0,
          this.height - below - this.heights[this.selected],
        );
        this.offset = this.walk(this.selected, -1, room);
      }
    }

    const above = Math.min(this.scrollPadding, this.rowsBetween(0, this.selected));
    if (
      this.selected < this.offset ||
      this.rowsBetween(this.offset, this.selected) < above
    ) {
      this.offset = this.walk(this.selected, -1, above);
    }
  }
}
