import type { ReactNode } from 'react';
import { appConfig } from '../config';
import { s, toInlineStyle, variantRules } from '../styles/withProps';

interface Props {
  children?: ReactNode;
}

export default function Button({ children }: Props) {
  const resolved = s({
    background: '--primary',
    color: '--gray-1',
    padding: '--size-3',
    borderRadius: '--radius-2',
    cursor: 'pointer',
    transition: 'background 0.3s ease',
    ':hover': { background: '--primary-dark' },
  });
  const className = appConfig.ctaButtonClassName;

  return (
    <>
      <style>{variantRules(`.${className}`, resolved)}</style>
      <button className={className} style={toInlineStyle(resolved)}>
        {children}
      </button>
    </>
  );
}
