import type { ImagePhase } from './types.js';

/**
 * Creates a frame that shows a spinner while the image loads, the image once
 * it has loaded and a flat placeholder if it fails. There is no retry.
 * @param src - Image URL.
 * @param alt - Alternative text.
 * @param onPhase - Optional callback for phase changes after creation.
 * @returns Frame element with a `data-phase` attribute.
 */
export const createImageFrame = (
  src: string,
  alt: string,
  onPhase?: (phase: ImagePhase) => void
): HTMLElement => {
  const frame = document.createElement('div');
  frame.className = 'media';
  frame.dataset.phase = 'loading';

  const spinner = document.createElement('span');
  spinner.className = 'media__spinner';
  spinner.setAttribute('role', 'progressbar');
  spinner.setAttribute('aria-label', 'Loading image');

  const image = document.createElement('img');
  image.className = 'media__image';
  image.alt = alt;
  image.decoding = 'async';

  const settle = (phase: ImagePhase): void => {
    if (frame.dataset.phase !== 'loading') {
      return;
    }
    frame.dataset.phase = phase;
    spinner.remove();
    if (phase === 'error') {
      image.remove();
      frame.setAttribute('role', 'img');
      frame.setAttribute('aria-label', alt);
    }
    onPhase?.(phase);
  };

  image.addEventListener('load', () => settle('loaded'), { once: true });
  image.addEventListener('error', () => settle('error'), { once: true });
  frame.append(spinner, image);
  image.src = src;
  return frame;
};

/**
 * Replaces every `[data-image-src]` placeholder under the root with a live image frame.
 * @param root - Container holding rendered markup.
 */
export const hydrateImages = (root: ParentNode): void => {
  root.querySelectorAll<HTMLElement>('[data-image-src]').forEach((slot) => {
    const src = slot.dataset.imageSrc ?? '';
    const alt = slot.dataset.imageAlt ?? '';
    const frame = createImageFrame(src, alt);
    frame.classList.add(...Array.from(slot.classList));
    slot.replaceWith(frame);
  });
};
