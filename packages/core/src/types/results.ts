/** Outcome of a store-backed operation on one numbered item */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly itemNumber: number }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly itemNumber: number }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export interface BatchResult {
  readonly results: readonly TaskResult[];
}

