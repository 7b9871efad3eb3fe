import { s, toInlineStyle } from '../styles/withProps';
import type { LiteralPropertyMap } from '../styles/types';

interface Props {
  css?: LiteralPropertyMap;
}

export default function Spacer({ css }: Props) {
  return <hr style={toInlineStyle(s(css))} />;
}
