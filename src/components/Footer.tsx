import { s, toInlineStyle } from '../styles/withProps';

export default function Footer() {
  return (
    <footer
      style={toInlineStyle(
        s({
          background: '--gray-9',
          color: '--gray-1',
          padding: '--size-3',
          textAlign: 'center',
        }),
      )}
    />
  );
}
