import cliSpinners from "cli-spinners";
import logUpdate from "log-update";
import { isTerminal } from "./tty.ts";

/**
 * Coarse progress reporting, one `advance` per item.
 */
export interface ProgressSink {
  begin(label: string, total: number): void;
  advance(current: number): void;
  end(): void;
}

export const silentProgress: ProgressSink = {
  begin() {},
  advance() {},
  end() {},
};

/**
 * Brackets `fn` with `begin` and `end`. `end` runs however `fn` exits.
 */
export async function withProgress<T>(
  sink: ProgressSink,
  label: string,
  total: number,
  fn: () => Promise<T>,
): Promise<T> {
  sink.begin(label, total);
  try {
    return await fn();
  } finally {
    sink.end();
  }
}

type ProgressState = {
  label: string;
  total: number;
  current: number;
  frame: number;
};

const BAR_WIDTH = 30;

function renderBar(current: number, total: number): string {
  const ratio = total === 0 ? 1 : Math.min(current / total, 1);
  const filled = Math.round(ratio * BAR_WIDTH);
  return `${"█".repeat(filled)}${"░".repeat(BAR_WIDTH - filled)}`;
}

/**
 * Spinner plus bar on a TTY, a start and end line elsewhere.
 */
export function createConsoleProgress(
  stream: NodeJS.WriteStream = process.stdout,
): ProgressSink {
  const spinner = cliSpinners.dots;
  const tty = isTerminal(stream);
  let state: ProgressState | undefined;
  let timer: NodeJS.Timeout | undefined;
  let lastRender: string | undefined;

  const render = () => {
    if (!state || !tty) return;
    const icon = spinner.frames[state.frame % spinner.frames.length];
    const output = `${icon} ${state.label} ${renderBar(state.current, state.total)} ${state.current}/${state.total}`;
    if (output === lastRender) return;
    lastRender = output;
    logUpdate(output);
  };

  const tick = () => {
    if (state) state.frame += 1;
    render();
  };

  return {
    begin(label, total) {
      state = { label, total, current: 0, frame: 0 };
      if (!tty) {
        console.log(`${label} [0/${total}]`);
        return;
      }
      // the spinner alone must not keep the process alive
      timer ??= setInterval(tick, spinner.interval).unref();
      render();
    },
    advance(current) {
      if (!state) return;
      state.current = current;
      render();
    },
    end() {
      if (timer !== undefined) clearInterval(timer);
      timer = undefined;
      if (state && !tty) {
        console.log(`${state.label} [${state.current}/${state.total}] done`);
      } else if (state) {
        render();
        logUpdate.done();
      }
      state = undefined;
      lastRender = undefined;
    },
  };
}
