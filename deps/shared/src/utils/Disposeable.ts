export interface AsyncDisposableResource {
  [Symbol.asyncDispose](): PromiseLike<void>;
}

/**
 * 釋放資源，等同 `await using` 離開區塊時的行為。
 */
export async function dispose(resource: AsyncDisposableResource) {
  await resource[Symbol.asyncDispose]();
}
