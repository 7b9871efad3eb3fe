import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import App from '../src/App';
import About from '../src/components/About';
import Footer from '../src/components/Footer';
import Main from '../src/components/Main';
import Nav from '../src/components/Nav';

describe('App', () => {
  it('composes nav, main and footer in order', () => {
    const page = App();
    const children: JSX.Element[] = page.props.children;
    expect(page.props.className).toBe('main-container');
    expect(children.map((child) => child.type)).toEqual([Nav, Main, Footer]);
  });

  it('fills the main column with the about section and the placeholder copy', () => {
    const main: JSX.Element = App().props.children[1];
    const content: JSX.Element[] = main.props.content;
    expect(content.map((child) => child.type)).toEqual([About, 'h1', 'p']);
    expect(content[0].props.css).toEqual({ color: '--red-12' });
    expect(content[1].props.children).toBe('Funny');
    expect(content[2].props.children).toBe('Content');
  });

  it('renders the keyed content inside the column', () => {
    const markup = renderToStaticMarkup(<App />);
    expect(markup).toContain(
      '<main style="max-width:800px;margin:0 auto;padding:var(--size-3)"><section id="about" style="color:var(--red-12)"><h1>About Praxis</h1><hr/>',
    );
    expect(markup).toContain('<h1>Funny</h1><p>Content</p></main><footer');
  });
});
