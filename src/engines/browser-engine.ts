export interface BrowserEngine {
  goto(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  currentTitle(): Promise<string>;
}
