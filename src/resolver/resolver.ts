import type { BrowserDriver } from "../driver/types.js";
import type { ResolverConfig } from "../config/schema.js";
import { AssertionMismatchError, ElementNotFoundError } from "../errors.js";
import { ok, err, type Result } from "../utils/result.js";
import { pollUntil } from "../utils/wait.js";
import { describeQuery, selectorChain, type ElementQuery } from "./query.js";

/** Valid only until the next interaction that may rebuild the surrounding markup. */
export interface ResolvedElement<H> {
  handle: H;
  /** The selector in the chain that produced the match. */
  selector: string;
  query: ElementQuery;
}

export type ResolverOptions = Pick<
  ResolverConfig,
  "timeoutMs" | "pollIntervalMs" | "optionSelector" | "comboboxSelector"
>;

const POPUP_KINDS = new Set(["listbox", "menu", "true"]);

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function normalize(text: string): string {
  return collapse(text).toLowerCase();
}

/**
 * Resolves element queries against a live page through an ordered fallback
 * chain, then performs one interaction on the match. Every operation starts
 * from a fresh lookup.
 */
export class DynamicElementResolver<H> {
  constructor(
    private readonly driver: BrowserDriver<H>,
    private readonly options: ResolverOptions
  ) {}

  /**
   * First visible, enabled match of the first selector in the chain that has
   * one. Each selector gets its own bounded wait before the next is tried.
   */
  async resolve(
    q: ElementQuery,
    timeoutMs: number = this.options.timeoutMs
  ): Promise<Result<ResolvedElement<H>, ElementNotFoundError>> {
    const chain = selectorChain(q);
    let scope: H | undefined;
    if (q.scope) {
      const container = await this.resolve(q.scope, timeoutMs);
      if (!container.ok) {
        return err(
          new ElementNotFoundError(
            [...container.error.attempted, ...chain],
            `container of ${describeQuery(q)}`
          )
        );
      }
      scope = container.value.handle;
    }

    for (const selector of chain) {
      const handle = await pollUntil(() => this.firstActionable(selector, scope), {
        timeoutMs,
        intervalMs: this.options.pollIntervalMs,
      });
      if (handle !== undefined) {
        return ok({ handle, selector, query: q });
      }
    }
    return err(new ElementNotFoundError(chain));
  }

  async click(q: ElementQuery): Promise<Result<ResolvedElement<H>, ElementNotFoundError>> {
    const target = await this.resolve(q);
    if (target.ok) await this.driver.click(target.value.handle);
    return target;
  }

  async fill(
    q: ElementQuery,
    text: string
  ): Promise<Result<ResolvedElement<H>, ElementNotFoundError>> {
    const target = await this.resolve(q);
    if (target.ok) await this.driver.fill(target.value.handle, text);
    return target;
  }

  async readText(q: ElementQuery): Promise<Result<string, ElementNotFoundError>> {
    const target = await this.resolve(q);
    if (!target.ok) return target;
    return ok(await this.driver.textOf(target.value.handle));
  }

  /**
   * Choose `value` in a dropdown. Native selects use the browser's own option
   * handling. Custom widgets are opened, the option is picked from the popup by
   * its visible text, and the control is resolved again to confirm the shown
   * value. A plain cell is clicked first to reveal the combobox inside it.
   */
  async select(
    q: ElementQuery,
    value: string
  ): Promise<Result<void, ElementNotFoundError | AssertionMismatchError>> {
    const target = await this.resolve(q);
    if (!target.ok) return target;

    if ((await this.driver.tagName(target.value.handle)) === "select") {
      await this.driver.selectOption(target.value.handle, value);
      return ok(undefined);
    }

    let controlQuery = q;
    if (!(await this.isComposite(target.value.handle))) {
      await this.driver.click(target.value.handle);
      controlQuery = { primary: this.options.comboboxSelector, scope: q };
    }

    const control = await this.resolve(controlQuery);
    if (!control.ok) return control;
    if ((await this.driver.attribute(control.value.handle, "aria-expanded")) !== "true") {
      await this.driver.click(control.value.handle);
    }

    const option = await pollUntil(() => this.matchOption(value), {
      timeoutMs: this.options.timeoutMs,
      intervalMs: this.options.pollIntervalMs,
    });
    if (option === undefined) {
      return err(
        new ElementNotFoundError(
          [`${this.options.optionSelector} with text "${value}"`],
          `option of ${describeQuery(controlQuery)}`
        )
      );
    }
    await this.driver.click(option);

    // The popup may have rebuilt the row; never read through the old handle.
    const shown = await this.readText(controlQuery);
    if (!shown.ok) return shown;
    if (!normalize(shown.value).includes(normalize(value))) {
      return err(
        new AssertionMismatchError(
          `Selection in ${describeQuery(controlQuery)} did not take effect`,
          value,
          shown.value
        )
      );
    }
    return ok(undefined);
  }

  private async firstActionable(selector: string, scope?: H): Promise<H | undefined> {
    const candidates = await this.driver.query(selector, scope);
    for (const candidate of candidates) {
      if ((await this.driver.isVisible(candidate)) && (await this.driver.isEnabled(candidate))) {
        return candidate;
      }
    }
    return undefined;
  }

  private async isComposite(handle: H): Promise<boolean> {
    if ((await this.driver.attribute(handle, "role")) === "combobox") return true;
    const popup = await this.driver.attribute(handle, "aria-haspopup");
    return popup !== null && POPUP_KINDS.has(popup);
  }

  /** Exact trimmed text wins over a case-insensitive substring match. */
  private async matchOption(value: string): Promise<H | undefined> {
    const exact = collapse(value);
    const wanted = exact.toLowerCase();
    let partial: H | undefined;
    for (const option of await this.driver.query(this.options.optionSelector)) {
      if (!(await this.driver.isVisible(option))) continue;
      const text = collapse(await this.driver.textOf(option));
      if (text === exact) return option;
      if (partial === undefined && text.toLowerCase().includes(wanted)) partial = option;
    }
    return partial;
  }
}
