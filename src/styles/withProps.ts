import type { CSSProperties } from 'react';
import type { PropertyMap, ResolvedStyle, StyleLiteral, StyleValue } from './types';

export const TOKEN_MARKER = '--';

export function isTokenReference(value: StyleValue): value is string {
  return typeof value === 'string' && value.startsWith(TOKEN_MARKER);
}

export function isStyleLiteral(value: StyleValue): value is StyleLiteral {
  return typeof value === 'string' || typeof value === 'number';
}

export function wrapVar(value: StyleValue): StyleValue {
  return isTokenReference(value) ? `var(${value})` : value;
}

/**
 * Turns a property map into `{ style }`, wrapping design-token references
 * (`'--primary'`) in `var()`. Only direct values are rewritten; nested variant
 * maps are copied through untouched.
 *
 * @example
 * withProps({ background: '--primary', color: 'red', margin: '10px' });
 * // => { style: { background: 'var(--primary)', color: 'red', margin: '10px' } }
 */
export function withProps(props: PropertyMap): ResolvedStyle {
  return {
    style: Object.fromEntries(Object.entries(props).map(([key, value]): [string, StyleValue] => [key, wrapVar(value)])),
  };
}

/**
 * Shorthand for `withProps` with optional overrides. `s()` is `{ style: {} }`.
 */
export function s(overrides?: PropertyMap): ResolvedStyle {
  return withProps(overrides ?? {});
}

function literalEntries(style: PropertyMap): [string, StyleLiteral][] {
  return Object.entries(style).flatMap(([key, value]): [string, StyleLiteral][] =>
    isStyleLiteral(value) ? [[key, value]] : [],
  );
}

// Inline styles have no selectors, so state variants are left out here.
// Keys are open strings (custom properties included) while CSSProperties only
// knows csstype's keyword unions, so the literals are merged in unchecked.
export function toInlineStyle({ style }: ResolvedStyle): CSSProperties {
  const inline: CSSProperties = {};
  return Object.assign(inline, Object.fromEntries(literalEntries(style)));
}

function hyphenate(property: string): string {
  if (property.startsWith(TOKEN_MARKER)) return property;
  return property.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

/**
 * Serializes the nested variant maps of a resolved style into CSS rules under
 * `selector`. Variant maps are resolved before serialization.
 *
 * @example
 * variantRules('.cta-button', s({ color: 'red', ':hover': { background: '--primary-dark' } }));
 * // => '.cta-button:hover{background:var(--primary-dark)}'
 */
export function variantRules(selector: string, { style }: ResolvedStyle): string {
  return Object.entries(style)
    .map(([variant, value]) => {
      if (isStyleLiteral(value)) return '';

      const declarations = literalEntries(withProps(value).style)
        .map(([property, literal]) => `${hyphenate(property)}:${literal}`)
        .join(';');
      if (!declarations) return '';

      const pseudo = variant.startsWith(':') ? variant : `:${variant}`;
      return `${selector}${pseudo}{${declarations}}`;
    })
    .join('');
}
