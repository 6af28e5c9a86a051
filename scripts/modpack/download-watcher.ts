import { watch, type FSWatcher } from "node:fs";
import { basename, join } from "node:path";
import fse from "fs-extra";

export type WatcherMessage =
  | { type: "file-complete"; path: string }
  | { type: "all-complete" }
  | { type: "error"; error: Error };

export type WatchSession = {
  messages: AsyncGenerator<WatcherMessage, void, undefined>;
  cancel(): void;
};

const CANCEL = Symbol("cancel");

type QueueItem = WatcherMessage | typeof CANCEL;

class MessageQueue {
  #items: QueueItem[] = [];
  #waiters: ((item: QueueItem) => void)[] = [];

  push(item: QueueItem): void {
    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.#items.push(item);
    }
  }

  next(): Promise<QueueItem> {
    const item = this.#items.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise((resolve) => this.#waiters.push(resolve));
  }
}

/**
 * Waits for manually downloaded files to appear in the downloads directory.
 */
export class DownloadWatcher {
  readonly #fileState: Map<string, boolean>;

  private constructor(readonly watchDir: string, fileState: Map<string, boolean>) {
    this.#fileState = fileState;
  }

  static async create(
    watchDir: string,
    fileNames: Iterable<string>,
  ): Promise<DownloadWatcher> {
    const state = new Map<string, boolean>();
    for (const name of fileNames) {
      state.set(name, await fse.pathExists(join(watchDir, name)));
    }
    return new DownloadWatcher(watchDir, state);
  }

  isFileComplete(fileName: string): boolean {
    return this.#fileState.get(fileName) ?? false;
  }

  isAllComplete(): boolean {
    return [...this.#fileState.values()].every(Boolean);
  }

  pending(): string[] {
    return [...this.#fileState].filter(([, done]) => !done).map(([name]) => name);
  }

  /**
   * Starts watching. The message stream ends after `all-complete`, after an
   * `error`, or once `cancel()` is called.
   */
  watch(): WatchSession {
    const queue = new MessageQueue();
    let watcher: FSWatcher | undefined;
    const close = () => {
      watcher?.close();
      watcher = undefined;
    };

    if (this.isAllComplete()) {
      queue.push({ type: "all-complete" });
    } else {
      watcher = watch(this.watchDir, (_event, fileName) => {
        if (!watcher || !fileName) return;
        const path = join(this.watchDir, fileName);
        if (this.#onFileComplete(path)) {
          queue.push({ type: "file-complete", path });
        }
        if (this.isAllComplete()) {
          queue.push({ type: "all-complete" });
          close();
        }
      });
      watcher.on("error", (error) => {
        queue.push({ type: "error", error });
        close();
      });
    }

    async function* messages(): AsyncGenerator<WatcherMessage, void, undefined> {
      try {
        while (true) {
          const item = await queue.next();
          if (item === CANCEL) return;
          yield item;
          if (item.type !== "file-complete") return;
        }
      } finally {
        close();
      }
    }

    return {
      messages: messages(),
      cancel() {
        close();
        queue.push(CANCEL);
      },
    };
  }

  #onFileComplete(path: string): boolean {
    const name = basename(path);
    // fs.watch reports a file several times while it is being written
    if (this.#fileState.get(name) !== false || !fse.pathExistsSync(path)) return false;
    this.#fileState.set(name, true);
    return true;
  }
}
