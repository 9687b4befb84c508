export type AsyncStatus = {
  isLoading: boolean;
  errorMessage: string | null;
};

export type ViewSnapshot<S> = S & AsyncStatus;

export type Listener<S> = (snapshot: ViewSnapshot<S>) => void;

const IDLE: AsyncStatus = { isLoading: false, errorMessage: null };

/**
 * Immutable snapshot plus subscription. `getSnapshot` and `subscribe` have
 * the shape React's `useSyncExternalStore` expects.
 */
export class ViewStateStore<S extends object> {
  private data: S;
  private status: AsyncStatus = IDLE;
  private snapshot: ViewSnapshot<S>;
  private readonly listeners = new Set<Listener<S>>();

  constructor(initialState: S) {
    this.data = initialState;
    this.snapshot = { ...initialState, ...IDLE };
  }

  getSnapshot = (): ViewSnapshot<S> => this.snapshot;

  subscribe = (listener: Listener<S>): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  protected setState(patch: Partial<S>) {
    this.data = { ...this.data, ...patch };
    this.publish();
  }

  protected setStatus(patch: Partial<AsyncStatus>) {
    this.status = { ...this.status, ...patch };
    this.publish();
  }

  /**
   * Clears the previous error and keeps the loading flag raised for exactly
   * the duration of `run`, whether it settles or throws.
   */
  protected async withLoading<T>(run: () => Promise<T>): Promise<T> {
    this.setStatus({ isLoading: true, errorMessage: null });
    try {
      return await run();
    } finally {
      this.setStatus({ isLoading: false });
    }
  }

  private publish() {
    const snapshot: ViewSnapshot<S> = { ...this.data, ...this.status };
    this.snapshot = snapshot;
    this.listeners.forEach((listener) => listener(snapshot));
  }
}
