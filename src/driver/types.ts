/**
 * Narrow browser surface the core drives. `H` is the driver's own element
 * handle type; the core never inspects it.
 */
export type WaitCondition =
  | { kind: "selector"; selector: string }
  | { kind: "url"; includes: string }
  | { kind: "network-idle" };

export interface BrowserDriver<H> {
  navigate(url: string, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  query(selector: string, scope?: H): Promise<H[]>;
  isVisible(element: H): Promise<boolean>;
  isEnabled(element: H): Promise<boolean>;
  attribute(element: H, name: string): Promise<string | null>;
  tagName(element: H): Promise<string>;
  fill(element: H, text: string): Promise<void>;
  click(element: H): Promise<void>;
  selectOption(element: H, value: string): Promise<void>;
  textOf(element: H): Promise<string>;
  /** Suspends until the condition holds; resolves false when the bound elapses. */
  waitFor(condition: WaitCondition, timeoutMs: number): Promise<boolean>;
  /** Non-blocking probe of the same conditions. */
  check(condition: WaitCondition): Promise<boolean>;
  screenshot(path: string): Promise<void>;
  pageContent(): Promise<string>;
}

/** A driver bound to one isolated browser context, released by `close`. */
export interface DriverSession<H> {
  driver: BrowserDriver<H>;
  close(): Promise<void>;
}

export type DriverFactory<H> = () => Promise<DriverSession<H>>;

export function describeCondition(condition: WaitCondition): string {
  switch (condition.kind) {
    case "selector":
      return `\`${condition.selector}\``;
    case "url":
      return `URL containing "${condition.includes}"`;
    case "network-idle":
      return "network idle";
  }
}
