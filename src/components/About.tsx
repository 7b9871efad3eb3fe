import { s, toInlineStyle, variantRules } from '../styles/withProps';
import type { PropertyMap } from '../styles/types';
import Spacer from './Spacer';

export const ABOUT_SECTION_ID = 'about';

interface Props {
  css?: PropertyMap;
}

export default function About({ css }: Props) {
  const resolved = s(css);
  const rules = variantRules(`#${ABOUT_SECTION_ID}`, resolved);

  return (
    <section id={ABOUT_SECTION_ID} style={toInlineStyle(resolved)}>
      <h1>About Praxis</h1>
      <Spacer />
      <del>Honestly... I dont really know myself, but:</del>
      <p>
        It's a prayer app for<b> Orthodox Christians</b>! Helps you with fasting days and keeps
        you updated on the Church's calendar.
      </p>
      {rules ? <style>{rules}</style> : null}
    </section>
  );
}
