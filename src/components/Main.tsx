import { cloneElement, type ReactElement } from 'react';
import { s, toInlineStyle } from '../styles/withProps';

interface Props {
  content: ReactElement[];
}

/**
 * Primary content column. Children are keyed by position so sibling elements
 * of the same shape stay distinguishable between renders.
 */
export default function Main({ content }: Props) {
  return (
    <main
      style={toInlineStyle(
        s({
          maxWidth: '800px',
          margin: '0 auto',
          padding: '--size-3',
        }),
      )}
    >
      {content.map((child, idx) => cloneElement(child, { key: idx }))}
    </main>
  );
}
