export { DynamicElementResolver, type ResolvedElement, type ResolverOptions } from "./resolver.js";
export { query, within, selectorChain, describeQuery, type ElementQuery } from "./query.js";
