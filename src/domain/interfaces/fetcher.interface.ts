/**
 * One outbound data source. `fetch` performs a single request and either
 * resolves with the parsed value or rejects with a FetchError.
 */
export interface IIndicatorFetcher<T> {
  readonly fetcherId: string;
  fetch(): Promise<T>;
}
