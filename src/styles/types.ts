/**
 * Literal CSS value, passed to the renderer as is.
 */
export type StyleLiteral = string | number;

/**
 * Semantic style description keyed by property name (camelCase or `--custom`).
 * Nested maps hold state variants such as `':hover'`.
 */
export interface PropertyMap {
  [property: string]: StyleValue;
}

export type StyleValue = StyleLiteral | PropertyMap;

/**
 * Property map without variants, for elements that have no selector of their own.
 */
export type LiteralPropertyMap = Record<string, StyleLiteral>;

/**
 * Output of the resolver, ready to spread into a component's style handling.
 */
export interface ResolvedStyle {
  style: PropertyMap;
}
