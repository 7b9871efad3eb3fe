import { s, toInlineStyle } from '../styles/withProps';

export default function Nav() {
  return (
    <nav
      style={toInlineStyle(
        s({
          background: '--gray-5',
          padding: '--size-3',
          boxShadow: '--shadow-1',
          position: 'sticky',
          top: '0',
          zIndex: '1000',
        }),
      )}
    >
      Nav
    </nav>
  );
}
