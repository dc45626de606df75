/**
 * Abstraction over a single controllable browser instance.
 *
 * All browser interactions in formpilot go through this interface. Only
 * driver implementations may import from playwright directly. An instance is
 * owned by exactly one submission and is never used concurrently.
 */
export interface BrowserDriver {
  /** Driver identifier */
  readonly type: DriverType;

  // -- Lifecycle --

  /** Launch the browser and open a page */
  launch(options: DriverLaunchOptions): Promise<void>;

  /** Close the page and browser, release resources. Safe to call twice. */
  close(): Promise<void>;

  /** Whether the browser is launched and not yet closed */
  isActive(): boolean;

  // -- Navigation --

  navigate(url: string): Promise<void>;

  currentUrl(): Promise<string>;

  /**
   * Wait until at least one element matches `query`.
   * Rejects with NavigationTimeoutError after `timeoutMs`.
   */
  waitFor(query: ElementQuery, timeoutMs: number): Promise<void>;

  // -- Query --

  /** All elements matching `query`, in document order */
  queryAll(query: ElementQuery): Promise<DriverElement[]>;

  /**
   * Script-evaluated full-document scan: the first element whose text
   * content includes `text` and that sits inside an element matching
   * `containerSelector`; returns that container.
   */
  findContainingAncestor(text: string, containerSelector: string): Promise<DriverElement | null>;

  // -- Page-level input --

  scrollToBottom(): Promise<void>;

  /** Full-page screenshot written to `path` */
  screenshot(path: string): Promise<void>;
}

/** Handle to an element on the driver's current page. */
export interface DriverElement {
  /** Descendants matching `query` */
  queryAll(query: ElementQuery): Promise<DriverElement[]>;

  /**
   * Native pointer click. Rejects with ClickInterceptedError when another
   * element would receive the click.
   */
  click(): Promise<void>;

  /** `el.click()` dispatched from page script, bypassing hit testing */
  scriptClick(): Promise<void>;

  scrollIntoView(options?: DriverScrollOptions): Promise<void>;

  getAttribute(name: string): Promise<string | null>;

  textContent(): Promise<string>;

  isVisible(): Promise<boolean>;

  /** Clear a form field's current value */
  clear(): Promise<void>;

  /** Type into a form field */
  type(text: string): Promise<void>;
}

// -- Types --

export type DriverType = 'playwright' | 'mock';

export interface DriverLaunchOptions {
  headless: boolean;
  viewport?: { width: number; height: number };
  /** Bound on a single direct click's actionability checks (ms) */
  clickTimeoutMs?: number;
}

export interface DriverScrollOptions {
  behavior?: 'smooth' | 'instant';
}

export type QueryRole = 'button' | 'checkbox' | 'radio' | 'listitem';

/**
 * Element query. `css` and `xpath` are raw selectors; `role` matches the
 * accessible role and name; `text` matches visible text (substring unless
 * `exact`).
 */
export type ElementQuery =
  | { css: string }
  | { xpath: string }
  | { role: QueryRole; name: string; exact?: boolean }
  | { text: string; exact?: boolean };

export function describeQuery(query: ElementQuery): string {
  if ('css' in query) return `css=${query.css}`;
  if ('xpath' in query) return `xpath=${query.xpath}`;
  if ('role' in query) return `role=${query.role}[name=${JSON.stringify(query.name)}]`;
  return `text=${JSON.stringify(query.text)}`;
}
