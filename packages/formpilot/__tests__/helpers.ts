import { vi } from 'vitest';
import type { BrowserDriver, DriverElement, ElementQuery } from '../src/driver/types.js';
import { Logger, MemoryLogSink } from '../src/monitoring/logger.js';

export const FORM_URL = 'http://localhost:8080/forms/survey/viewform';

/** Debug-level logger that records into memory. */
export function memoryLogger(): { logger: Logger; sink: MemoryLogSink } {
  const sink = new MemoryLogSink();
  return { logger: new Logger({ level: 'debug', sinks: [sink] }), sink };
}

export function stubElement(overrides: Partial<DriverElement> = {}): DriverElement {
  return {
    queryAll: vi.fn(async (_query: ElementQuery): Promise<DriverElement[]> => []),
    click: vi.fn(async (): Promise<void> => {}),
    scriptClick: vi.fn(async (): Promise<void> => {}),
    scrollIntoView: vi.fn(async (): Promise<void> => {}),
    getAttribute: vi.fn(async (_name: string): Promise<string | null> => null),
    textContent: vi.fn(async (): Promise<string> => ''),
    isVisible: vi.fn(async (): Promise<boolean> => true),
    clear: vi.fn(async (): Promise<void> => {}),
    type: vi.fn(async (_text: string): Promise<void> => {}),
    ...overrides,
  };
}

export function stubDriver(overrides: Partial<BrowserDriver> = {}): BrowserDriver {
  return {
    type: 'mock',
    launch: vi.fn(async (): Promise<void> => {}),
    close: vi.fn(async (): Promise<void> => {}),
    isActive: vi.fn((): boolean => true),
    navigate: vi.fn(async (_url: string): Promise<void> => {}),
    currentUrl: vi.fn(async (): Promise<string> => 'about:blank'),
    waitFor: vi.fn(async (_query: ElementQuery, _timeoutMs: number): Promise<void> => {}),
    queryAll: vi.fn(async (_query: ElementQuery): Promise<DriverElement[]> => []),
    findContainingAncestor: vi.fn(
      async (_text: string, _containerSelector: string): Promise<DriverElement | null> => null,
    ),
    scrollToBottom: vi.fn(async (): Promise<void> => {}),
    screenshot: vi.fn(async (_path: string): Promise<void> => {}),
    ...overrides,
  };
}

/** A driver whose queryAll answers xpath queries from a map keyed by the exact expression. */
export function xpathDriver(
  byXpath: Record<string, DriverElement[]>,
  scanResult: DriverElement | null = null,
): BrowserDriver {
  return stubDriver({
    queryAll: vi.fn(async (query: ElementQuery): Promise<DriverElement[]> =>
      'xpath' in query ? (byXpath[query.xpath] ?? []) : [],
    ),
    findContainingAncestor: vi.fn(async (): Promise<DriverElement | null> => scanResult),
  });
}
