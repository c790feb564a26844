export type PageFetcher = (url: string) => Promise<string>;

export interface PageFetchers {
  /** Plain HTTP GET, no script execution. */
  fetchStatic: PageFetcher;
  /** Full browser render; only used when the static page yields nothing. */
  fetchRendered: PageFetcher;
}
