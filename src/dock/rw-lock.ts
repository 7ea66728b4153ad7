// ---------------------------------------------------------------------------
// AsyncRwLock – promise-based reader/writer lock
// ---------------------------------------------------------------------------
// Many readers or one writer. Waiters are served in arrival order, so a
// queued writer holds back readers that arrive after it.
// ---------------------------------------------------------------------------

export type Release = () => void;

type LockMode = "read" | "write";

type Waiter = {
  mode: LockMode;
  wake: () => void;
};

export class AsyncRwLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  acquireRead(): Promise<Release> {
    if (!this.writing && this.queue.length === 0) {
      this.readers++;
      return Promise.resolve(this.releaser("read"));
    }
    return new Promise((resolve) => {
      this.queue.push({ mode: "read", wake: () => resolve(this.releaser("read")) });
    });
  }

  acquireWrite(): Promise<Release> {
    if (!this.writing && this.readers === 0 && this.queue.length === 0) {
      this.writing = true;
      return Promise.resolve(this.releaser("write"));
    }
    return new Promise((resolve) => {
      this.queue.push({ mode: "write", wake: () => resolve(this.releaser("write")) });
    });
  }

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get status(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private releaser(mode: LockMode): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      if (mode === "read") {
        this.readers--;
      } else {
        this.writing = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    for (let next = this.queue[0]; next; next = this.queue[0]) {
      if (this.writing) {
        return;
      }
      if (next.mode === "write") {
        if (this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writing = true;
        next.wake();
        return;
      }
      this.queue.shift();
      this.readers++;
      next.wake();
    }
  }
}
