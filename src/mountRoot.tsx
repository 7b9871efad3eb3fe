import type { ReactElement } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';

/**
 * Anything that can take a composed element tree and put it into a container.
 */
export type RenderHost = (root: ReactElement, container: Element) => void;

export class MountTargetError extends Error {
  constructor(readonly elementId: string) {
    super(`Mount element '#${elementId}' was not found in the document.`);
    this.name = 'MountTargetError';
  }
}

export const reactDomHost: RenderHost = (root, container) => {
  createRoot(container).render(root);
};

export function mountRoot(container: Element, host: RenderHost = reactDomHost) {
  host(<App />, container);
}
