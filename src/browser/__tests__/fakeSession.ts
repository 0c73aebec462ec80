import type { BrowserPage, BrowserSession } from '../session.js';

export type FakeMethod =
  | 'goto'
  | 'click'
  | 'fill'
  | 'type'
  | 'waitForTimeout'
  | 'waitForSelector'
  | 'screenshot'
  | 'innerText'
  | 'title';

export interface FakeCall {
  method: FakeMethod;
  args: unknown[];
}

export interface FakePageOptions {
  title?: string;
  text?: string;
  /** Methods that reject, with the error message to reject with. */
  failures?: Partial<Record<FakeMethod, string>>;
}

/** In-process stand-in for a Playwright page that records every call. */
export class FakePage implements BrowserPage {
  readonly calls: FakeCall[] = [];
  private currentUrl = 'about:blank';

  constructor(private readonly options: FakePageOptions = {}) {}

  private record(method: FakeMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.options.failures?.[method];
    if (failure !== undefined) throw new Error(failure);
  }

  methods(): FakeMethod[] {
    return this.calls.map((c) => c.method);
  }

  async goto(url: string, options?: object): Promise<null> {
    this.record('goto', [url, options]);
    this.currentUrl = url;
    return null;
  }

  async click(selector: string, options?: object): Promise<void> {
    this.record('click', [selector, options]);
  }

  async fill(selector: string, value: string, options?: object): Promise<void> {
    this.record('fill', [selector, value, options]);
  }

  async type(selector: string, text: string, options?: object): Promise<void> {
    this.record('type', [selector, text, options]);
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.record('waitForTimeout', [timeout]);
  }

  async waitForSelector(selector: string, options?: object): Promise<null> {
    this.record('waitForSelector', [selector, options]);
    return null;
  }

  async screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer> {
    this.record('screenshot', [options]);
    return Buffer.alloc(0);
  }

  async innerText(selector: string, options?: object): Promise<string> {
    this.record('innerText', [selector, options]);
    return this.options.text ?? '';
  }

  async title(): Promise<string> {
    this.record('title', []);
    return this.options.title ?? '';
  }

  url(): string {
    return this.currentUrl;
  }
}

export class FakeSession implements BrowserSession {
  readonly page: FakePage;
  closeCount = 0;

  constructor(
    options: FakePageOptions = {},
    private readonly closeError?: string,
  ) {
    this.page = new FakePage(options);
  }

  async close(): Promise<void> {
    this.closeCount++;
    if (this.closeError !== undefined) throw new Error(this.closeError);
  }
}
