import type { LogModel, MouseAction } from "../lib/logModel.js";
import { logger } from "../lib/logger.js";
import { parseInput, type InputEvent } from "./keys.js";
import type { Terminal } from "./terminal.js";
import { HEADER_ROWS, renderScreen } from "./view.js";

/**
 * Translate a mouse report into an action on the list. Clicks outside the
 * list area are ignored.
 */
export function toMouseAction(
  event: Extract<InputEvent, { kind: "mouse" }>,
  listRows: number,
): MouseAction | undefined {
  switch (event.button) {
    case "wheelDown":
      return { kind: "scrollDown" };
    case "wheelUp":
      return { kind: "scrollUp" };
    case "left":
    case "right": {
      const row = event.row - HEADER_ROWS;
      if (row < 0 || row >= listRows) return undefined;
      return { kind: event.button === "left" ? "leftClick" : "rightClick", row };
    }
  }
}

async function handleInput(model: LogModel, event: InputEvent): Promise<void> {
  if (event.kind === "key") {
    logger.debug(`Key ${event.key}`);
    await model.handleKey(event.key);
    return;
  }
  const action = toMouseAction(event, model.viewport.height);
  if (action) {
    await model.handleMouse(action);
  }
}

/**
 * Feed terminal input to the model one event at a time, redrawing after
 * each, until the model quits. Rejects with the first error the model does
 * not handle itself.
 */
export function runEventLoop(model: LogModel, terminal: Terminal): Promise<void> {
  return new Promise((resolve, reject) => {
    let queue = Promise.resolve();
    let stopped = false;

    const draw = () => terminal.draw(renderScreen(model, terminal.size()));

    const stop = () => {
      stopped = true;
      terminal.input.off("data", onData);
      terminal.output.off("resize", onResize);
    };

    const enqueue = (task: () => Promise<void>) => {
      queue = queue
        .then(async () => {
          if (stopped) return;
          await task();
          if (model.state === "quit") {
            stop();
            resolve();
            return;
          }
          draw();
        })
        .catch((error: unknown) => {
          stop();
          reject(error);
        });
    };

    const onData = (data: string | Buffer) => {
      for (const event of parseInput(data.toString())) {
        enqueue(() => handleInput(model, event));
      }
    };
    const onResize = () => enqueue(async () => {});

    terminal.input.on("data", onData);
    terminal.output.on("resize", onResize);
    draw();
  });
}
