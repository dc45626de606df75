import { ClickInterceptedError, DriverLaunchError, FormPilotError, NavigationTimeoutError } from '../errors.js';
import { sleep } from '../lib/sleep.js';
import {
  describeQuery,
  type BrowserDriver,
  type DriverElement,
  type DriverLaunchOptions,
  type ElementQuery,
} from './types.js';

export type MockControl = 'text' | 'email' | 'number' | 'textarea' | 'checkbox' | 'radio' | 'none';

/**
 * - `ok`: clicks land
 * - `intercept`: direct clicks are intercepted, script clicks land
 * - `broken`: both direct and script clicks fail
 */
export type MockClickBehavior = 'ok' | 'intercept' | 'broken';

export interface MockQuestion {
  label: string;
  control: MockControl;
  /** Radio option labels. Default: Option 1..3 */
  options?: string[];
  clickBehavior?: MockClickBehavior;
  /** Checkbox starts checked, or the named radio option starts selected */
  initiallyChecked?: boolean | string;
  /** Wrap the label text in an inline span */
  nestedLabel?: boolean;
}

export interface MockSection {
  questions: MockQuestion[];
}

export interface MockDriverHooks {
  onLaunch?: () => void;
  onClose?: () => void;
}

export interface MockDriverConfig {
  sections: MockSection[];
  /** Text shown after submitting; null shows a blank page. Default: "Your response has been recorded." */
  confirmationText?: string | null;
  /** Move to a formResponse URL on submit (default: true) */
  redirectOnSubmit?: boolean;
  nextButtonText?: string;
  /** Submit button text; null renders a textless button carrying a submit jsaction */
  submitButtonText?: string | null;
  /** Click behaviour of the Next and Submit buttons */
  buttonClickBehavior?: MockClickBehavior;
  /** Simulate a browser that fails to start (default: false) */
  failLaunch?: boolean;
  /** Render the form element at all (default: true) */
  formLoads?: boolean;
  /** Delay applied to navigation and clicks (default: 0) */
  actionDelayMs?: number;
  hooks?: MockDriverHooks;
}

const DEFAULT_OPTIONS = ['Option 1', 'Option 2', 'Option 3'];

// ── Fake document ────────────────────────────────────────────────────────

interface CssCondition {
  attr: string;
  op: '=' | '*=';
  value: string;
}

interface CssSelector {
  tag: string | null;
  conditions: CssCondition[];
}

const CSS_PATTERN = /^([a-zA-Z]+|\*)?((?:\[[^\]]+\])*)$/;
const CSS_CONDITION_PATTERN = /\[([a-zA-Z-]+)(\*?=)(?:'([^']*)'|"([^"]*)")\]/g;

/** Parses the tag[attr='v'][attr*='v'] subset the engine emits. */
export function parseSimpleCss(selector: string): CssSelector {
  const m = CSS_PATTERN.exec(selector.trim());
  if (!m) {
    throw new Error(`MockDriver: unsupported css selector "${selector}"`);
  }
  const conditions: CssCondition[] = [];
  for (const c of (m[2] ?? '').matchAll(CSS_CONDITION_PATTERN)) {
    conditions.push({ attr: c[1], op: c[2] === '*=' ? '*=' : '=', value: c[3] ?? c[4] ?? '' });
  }
  const bracketCount = (m[2] ?? '').split('[').length - 1;
  if (bracketCount !== conditions.length) {
    throw new Error(`MockDriver: unsupported css selector "${selector}"`);
  }
  const tag = m[1] && m[1] !== '*' ? m[1].toLowerCase() : null;
  return { tag, conditions };
}

export class MockElement implements DriverElement {
  readonly children: MockElement[] = [];
  parent: MockElement | null = null;
  readonly attributes = new Map<string, string>();
  value = '';
  clickCount = 0;
  scriptClickCount = 0;
  scrollCount = 0;

  constructor(
    private readonly driver: MockDriver,
    readonly tag: string,
    attrs: Record<string, string> = {},
    readonly ownText = '',
    public clickBehavior: MockClickBehavior = 'ok',
  ) {
    for (const [k, v] of Object.entries(attrs)) this.attributes.set(k, v);
  }

  append(...nodes: MockElement[]): this {
    for (const node of nodes) {
      node.parent = this;
      this.children.push(node);
    }
    return this;
  }

  /** Descendants in document order, excluding this element. */
  descendants(): MockElement[] {
    const out: MockElement[] = [];
    for (const child of this.children) {
      out.push(child, ...child.descendants());
    }
    return out;
  }

  fullText(): string {
    return this.ownText + this.children.map((c) => c.fullText()).join('');
  }

  matchesCss(selector: CssSelector): boolean {
    if (selector.tag && selector.tag !== this.tag) return false;
    return selector.conditions.every((c) => {
      const actual = this.attributes.get(c.attr);
      if (actual === undefined) return false;
      return c.op === '=' ? actual === c.value : actual.includes(c.value);
    });
  }

  closest(selector: CssSelector): MockElement | null {
    for (let node: MockElement | null = this; node; node = node.parent) {
      if (node.matchesCss(selector)) return node;
    }
    return null;
  }

  accessibleName(): string {
    return (this.attributes.get('aria-label') ?? this.fullText()).trim();
  }

  private matches(query: ElementQuery, candidates: MockElement[]): boolean {
    if ('css' in query) return this.matchesCss(parseSimpleCss(query.css));
    if ('xpath' in query) return false;
    if ('role' in query) {
      if (this.attributes.get('role') !== query.role) return false;
      const name = this.accessibleName();
      return query.exact ? name === query.name : name.toLowerCase().includes(query.name.toLowerCase());
    }
    const text = this.fullText().trim();
    const hit = query.exact ? text === query.text : text.toLowerCase().includes(query.text.toLowerCase());
    // innermost match only, like a text engine
    return hit && !this.children.some((c) => candidates.includes(c) && c.matches(query, candidates));
  }

  select(query: ElementQuery): MockElement[] {
    const candidates = this.descendants();
    return candidates.filter((el) => el.matches(query, candidates));
  }

  async queryAll(query: ElementQuery): Promise<DriverElement[]> {
    return this.select(query);
  }

  async click(): Promise<void> {
    await this.driver.delay();
    this.clickCount++;
    if (this.clickBehavior !== 'ok') {
      throw new ClickInterceptedError(`Element <div class="tooltip"> intercepts pointer events`);
    }
    this.driver.activate(this);
  }

  async scriptClick(): Promise<void> {
    this.scriptClickCount++;
    if (this.clickBehavior === 'broken') {
      throw new Error('Element is not attached to the DOM');
    }
    this.driver.activate(this);
  }

  async scrollIntoView(): Promise<void> {
    this.scrollCount++;
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.attributes.get(name) ?? null;
  }

  async textContent(): Promise<string> {
    return this.fullText();
  }

  async isVisible(): Promise<boolean> {
    return this.driver.isAttached(this);
  }

  async clear(): Promise<void> {
    this.assertEditable();
    this.value = '';
  }

  async type(text: string): Promise<void> {
    this.assertEditable();
    this.value += text;
  }

  private assertEditable(): void {
    if (this.tag !== 'input' && this.tag !== 'textarea') {
      throw new Error(`Element <${this.tag}> is not an <input> or <textarea>`);
    }
  }
}

// ── Driver ───────────────────────────────────────────────────────────────

/**
 * Mock driver for unit/integration tests and dry runs.
 * Does NOT launch a browser: renders a fake multi-section form whose
 * controls follow ARIA radio/checkbox semantics. XPath queries are not
 * evaluated and always return no matches.
 */
export class MockDriver implements BrowserDriver {
  readonly type = 'mock' as const;
  private readonly config: Required<Omit<MockDriverConfig, 'hooks' | 'confirmationText' | 'submitButtonText'>> & {
    confirmationText: string | null;
    submitButtonText: string | null;
    hooks: MockDriverHooks;
  };
  private active = false;
  private url = 'about:blank';
  private sectionIndex = -1;
  private submittedFlag = false;
  private body: MockElement;
  readonly screenshots: string[] = [];
  readonly visitedUrls: string[] = [];

  constructor(config: MockDriverConfig) {
    this.config = {
      sections: config.sections,
      confirmationText:
        config.confirmationText === undefined ? 'Your response has been recorded.' : config.confirmationText,
      redirectOnSubmit: config.redirectOnSubmit ?? true,
      nextButtonText: config.nextButtonText ?? 'Next',
      submitButtonText: config.submitButtonText === undefined ? 'Submit' : config.submitButtonText,
      buttonClickBehavior: config.buttonClickBehavior ?? 'ok',
      failLaunch: config.failLaunch ?? false,
      formLoads: config.formLoads ?? true,
      actionDelayMs: config.actionDelayMs ?? 0,
      hooks: config.hooks ?? {},
    };
    this.body = new MockElement(this, 'body');
  }

  // -- Lifecycle --

  async launch(_options: DriverLaunchOptions): Promise<void> {
    if (this.config.failLaunch) {
      throw new DriverLaunchError(new Error('Executable doesn\'t exist at /mock/chromium'));
    }
    this.active = true;
    this.config.hooks.onLaunch?.();
  }

  async close(): Promise<void> {
    if (!this.active) return;
    this.active = false;
    this.config.hooks.onClose?.();
  }

  isActive(): boolean {
    return this.active;
  }

  // -- Navigation --

  async navigate(url: string): Promise<void> {
    this.assertActive();
    await this.delay();
    this.url = url;
    this.visitedUrls.push(url);
    this.submittedFlag = false;
    this.renderSection(0);
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  async waitFor(query: ElementQuery, timeoutMs: number): Promise<void> {
    this.assertActive();
    if (this.body.select(query).length === 0) {
      throw new NavigationTimeoutError(describeQuery(query), timeoutMs);
    }
  }

  // -- Query --

  async queryAll(query: ElementQuery): Promise<DriverElement[]> {
    this.assertActive();
    return this.body.select(query);
  }

  async findContainingAncestor(text: string, containerSelector: string): Promise<DriverElement | null> {
    this.assertActive();
    const container = parseSimpleCss(containerSelector);
    const match = this.body
      .descendants()
      .find((el) => el.tag === 'div' && el.fullText().includes(text) && el.closest(container) !== null);
    return match?.closest(container) ?? null;
  }

  async scrollToBottom(): Promise<void> {
    this.assertActive();
  }

  async screenshot(path: string): Promise<void> {
    this.assertActive();
    this.screenshots.push(path);
  }

  // -- Inspection helpers for tests --

  get currentSection(): number {
    return this.sectionIndex;
  }

  get submitted(): boolean {
    return this.submittedFlag;
  }

  listItem(label: string): MockElement | undefined {
    return this.body
      .select({ css: "div[role='listitem']" })
      .find((item) => item.select({ css: "div[data-kind='title']" }).some((t) => t.fullText() === label));
  }

  controls(label: string, role: 'radio' | 'checkbox'): MockElement[] {
    return this.listItem(label)?.select({ css: `div[role='${role}']` }) ?? [];
  }

  checkedOptions(label: string): string[] {
    return this.controls(label, 'radio')
      .filter((r) => r.attributes.get('aria-checked') === 'true')
      .map((r) => r.attributes.get('data-value') ?? '');
  }

  fieldValue(label: string): string | undefined {
    const field = this.listItem(label)?.descendants().find((el) => el.tag === 'input' || el.tag === 'textarea');
    return field?.value;
  }

  isAttached(el: MockElement): boolean {
    for (let node: MockElement | null = el; node; node = node.parent) {
      if (node === this.body) return true;
    }
    return false;
  }

  /** @internal Applies the effect of a click that landed. */
  activate(el: MockElement): void {
    const role = el.attributes.get('role');
    if (role === 'radio') {
      const group = el.parent;
      for (const sibling of group?.children ?? []) {
        if (sibling.attributes.get('role') === 'radio') sibling.attributes.set('aria-checked', 'false');
      }
      el.attributes.set('aria-checked', 'true');
      return;
    }
    if (role === 'checkbox') {
      const checked = el.attributes.get('aria-checked') === 'true';
      el.attributes.set('aria-checked', checked ? 'false' : 'true');
      return;
    }
    const action = el.attributes.get('data-action');
    if (action === 'next') {
      this.renderSection(this.sectionIndex + 1);
    } else if (action === 'submit') {
      this.renderConfirmation();
    }
  }

  /** @internal */
  delay(): Promise<void> {
    return sleep(this.config.actionDelayMs);
  }

  // -- Rendering --

  private assertActive(): void {
    if (!this.active) {
      throw new FormPilotError('The browser page has not been initialised yet.', 'driver_not_started');
    }
  }

  private renderSection(index: number): void {
    this.sectionIndex = index;
    this.body = new MockElement(this, 'body');
    if (!this.config.formLoads) return;

    const section = this.config.sections[index];
    const form = new MockElement(this, 'form');
    const list = new MockElement(this, 'div', { role: 'list' });
    for (const question of section?.questions ?? []) {
      list.append(this.renderQuestion(question));
    }
    form.append(list);

    const isLast = index >= this.config.sections.length - 1;
    if (!isLast) {
      form.append(this.renderButton('next', this.config.nextButtonText));
    } else if (this.config.submitButtonText !== null) {
      form.append(this.renderButton('submit', this.config.submitButtonText));
    } else {
      form.append(
        new MockElement(
          this,
          'div',
          { role: 'button', 'data-action': 'submit', jsaction: 'click:submit' },
          '',
          this.config.buttonClickBehavior,
        ),
      );
    }
    this.body.append(form);
  }

  private renderButton(action: 'next' | 'submit', text: string): MockElement {
    return new MockElement(
      this,
      'div',
      { role: 'button', 'data-action': action },
      '',
      this.config.buttonClickBehavior,
    ).append(new MockElement(this, 'span', {}, text));
  }

  private renderQuestion(q: MockQuestion): MockElement {
    const item = new MockElement(this, 'div', { role: 'listitem' });
    const title = q.nestedLabel
      ? new MockElement(this, 'div', { 'data-kind': 'title' }).append(new MockElement(this, 'span', {}, q.label))
      : new MockElement(this, 'div', { 'data-kind': 'title' }, q.label);
    item.append(title);

    const behavior = q.clickBehavior ?? 'ok';
    switch (q.control) {
      case 'text':
      case 'email':
      case 'number':
        item.append(new MockElement(this, 'input', { type: q.control }));
        break;
      case 'textarea':
        item.append(new MockElement(this, 'textarea'));
        break;
      case 'checkbox':
        item.append(
          new MockElement(
            this,
            'div',
            { role: 'checkbox', 'aria-label': q.label, 'aria-checked': q.initiallyChecked === true ? 'true' : 'false' },
            '',
            behavior,
          ),
        );
        break;
      case 'radio': {
        const group = new MockElement(this, 'div', { role: 'radiogroup' });
        for (const option of q.options ?? DEFAULT_OPTIONS) {
          group.append(
            new MockElement(
              this,
              'div',
              {
                role: 'radio',
                'aria-label': option,
                'data-value': option,
                'aria-checked': q.initiallyChecked === option ? 'true' : 'false',
              },
              '',
              behavior,
            ),
          );
        }
        item.append(group);
        break;
      }
      case 'none':
        break;
    }
    return item;
  }

  private renderConfirmation(): void {
    this.submittedFlag = true;
    this.sectionIndex = this.config.sections.length;
    if (this.config.redirectOnSubmit) {
      this.url = responseUrl(this.url);
    }
    this.body = new MockElement(this, 'body');
    if (this.config.confirmationText !== null) {
      this.body.append(new MockElement(this, 'div', {}, this.config.confirmationText));
    }
  }
}

function responseUrl(url: string): string {
  try {
    return new URL('formResponse', url).toString();
  } catch {
    return `${url}/formResponse`;
  }
}
