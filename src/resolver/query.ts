/**
 * How to find a control. Holds selectors only, never a resolved handle:
 * the markup behind it may be replaced after any mutating interaction.
 */
export interface ElementQuery {
  primary: string;
  fallbacks?: readonly string[];
  /** Container resolved first (and afresh) on every lookup. */
  scope?: ElementQuery;
}

export function query(primary: string, ...fallbacks: string[]): ElementQuery {
  return { primary, fallbacks };
}

export function within(target: ElementQuery, scope: ElementQuery): ElementQuery {
  return { ...target, scope };
}

export function selectorChain(q: ElementQuery): string[] {
  return [q.primary, ...(q.fallbacks ?? [])];
}

export function describeQuery(q: ElementQuery): string {
  const chain = selectorChain(q)
    .map((s) => `\`${s}\``)
    .join(" or ");
  return q.scope ? `${chain} within ${describeQuery(q.scope)}` : chain;
}
