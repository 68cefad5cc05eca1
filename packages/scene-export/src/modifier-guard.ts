// ---------------------------------------------------------------------------
// Scoped enabling of a point-generating modifier
// ---------------------------------------------------------------------------

import type { ModifierState } from './types.js';

/**
 * Run `fn` with the modifier visible in viewport and render and its preview
 * switched off, then put every switch back as it was, whether `fn` resolves
 * or throws.
 */
export async function withModifierEnabled<T>(
  modifier: ModifierState,
  fn: () => T | Promise<T>,
): Promise<T> {
  const saved: ModifierState = { ...modifier };

  modifier.showViewport = true;
  modifier.showRender = true;
  if (saved.preview !== undefined) modifier.preview = false;

  try {
    return await fn();
  } finally {
    modifier.showViewport = saved.showViewport;
    modifier.showRender = saved.showRender;
    if (saved.preview !== undefined) modifier.preview = saved.preview;
  }
}
