// src/session/holder.ts
import { messageOf } from "../mcp/errors.js";

export interface Closable {
  close(): Promise<void>;
}

/**
 * At most one long-lived session, swappable on demand.
 *
 * All mutations run one at a time; a replace() that overlaps a release()
 * waits for it. Closing the old session is best effort.
 */
export class SessionHolder<T extends Closable> {
  private session: T | null = null;
  private lock: Promise<unknown> = Promise.resolve();

  get current(): T | null {
    return this.session;
  }

  /** Close the held session (if any), then open and hold a new one. */
  replace(open: () => Promise<T>, beforeClose?: (session: T) => Promise<void>): Promise<T> {
    return this.exclusive(async () => {
      await this.dispose(beforeClose);
      const next = await open();
      this.session = next;
      return next;
    });
  }

  /** Close and forget the held session. Resolves false when there was none. */
  release(beforeClose?: (session: T) => Promise<void>): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.session) return false;
      await this.dispose(beforeClose);
      return true;
    });
  }

  private async dispose(beforeClose?: (session: T) => Promise<void>) {
    const session = this.session;
    if (!session) return;
    this.session = null;

    if (beforeClose) {
      try {
        await beforeClose(session);
      } catch (e) {
        console.warn("[session] pre-close step failed:", messageOf(e));
      }
    }
    try {
      await session.close();
    } catch (e) {
      console.warn("[session] close failed:", messageOf(e));
    }
  }

  private exclusive<R>(fn: () => Promise<R>): Promise<R> {
    const run = this.lock.then(fn);
    this.lock = run.catch(() => undefined);
    return run;
  }
}
