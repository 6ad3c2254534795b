import type { Frame } from './frame.js';

export type FrameSourceKind = 'animated' | 'stills';

/**
 * `missing` and `empty` are ordinary outcomes: the view turns them into a
 * placeholder message instead of failing.
 */
export type FrameSourceResult =
  | { readonly status: 'ok'; readonly kind: FrameSourceKind; readonly frames: Frame[] }
  | { readonly status: 'missing' }
  | { readonly status: 'empty' };

export type FrameSourceStatus = FrameSourceResult['status'];
