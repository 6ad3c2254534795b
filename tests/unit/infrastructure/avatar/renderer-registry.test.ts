import { describe, expect, test, vi } from 'vitest';

import type { ExternalPixelCapability } from '../../../../src/domain/avatar/contracts/glyph-renderer.js';
import type { Frame, StyledGrid } from '../../../../src/domain/avatar/value-objects/frame.js';
import { loadExternalPixelCapability } from '../../../../src/infrastructure/avatar/renderers/external-pixel.renderer.js';
import { GlyphRendererRegistry } from '../../../../src/infrastructure/avatar/renderers/renderer-registry.js';
import { AppError } from '../../../../src/shared/errors/app-error.js';

const options = { widthChars: 1, heightChars: 1, background: [0, 0, 0] as const };

const frame: Frame = {
  bitmap: { width: 2, height: 4, data: new Uint8ClampedArray(2 * 4 * 4).fill(255) },
  durationSeconds: 0.1,
};

const externalGrid: StyledGrid = { rows: [[{ text: '#', foreground: [1, 2, 3], background: null }]] };

const capability = (renderFrame: ExternalPixelCapability['renderFrame']): ExternalPixelCapability => ({
  name: 'test-pixels',
  renderFrame,
});

describe('GlyphRendererRegistry', () => {
  test('auto prefers an available external capability', () => {
    const registry = new GlyphRendererRegistry({ external: capability(() => externalGrid) });

    expect(registry.candidatesFor('auto')).toEqual(['external', 'braille', 'halfblock']);
    expect(registry.renderAll([frame], 'auto', options)).toEqual({ strategy: 'external', grids: [externalGrid] });
  });

  test('auto falls through to braille when the external capability throws', () => {
    const renderFrame = vi.fn(() => {
      throw new Error('boom');
    });
    const registry = new GlyphRendererRegistry({ external: capability(renderFrame) });

    const selection = registry.renderAll([frame], 'auto', options);

    expect(renderFrame).toHaveBeenCalledTimes(1);
    expect(selection.strategy).toBe('braille');
    expect(selection.grids).toHaveLength(1);
  });

  test('auto without an external capability starts at braille', () => {
    const registry = new GlyphRendererRegistry();

    expect(registry.hasExternal).toBe(false);
    expect(registry.candidatesFor('auto')).toEqual(['braille', 'halfblock']);
    expect(registry.renderAll([frame], 'auto', options).strategy).toBe('braille');
  });

  test('no frames ends on the half-block fallback with nothing rendered', () => {
    const registry = new GlyphRendererRegistry();

    expect(registry.renderAll([], 'auto', options)).toEqual({ strategy: 'halfblock', grids: [] });
  });

  test('a pinned built-in backend is used as-is', () => {
    const registry = new GlyphRendererRegistry({ external: capability(() => externalGrid) });

    expect(registry.renderAll([frame], 'halfblock', options).strategy).toBe('halfblock');
    expect(registry.renderAll([frame], 'braille', options).strategy).toBe('braille');
  });

  test('a pinned external backend without a capability is a configuration error', () => {
    const registry = new GlyphRendererRegistry();

    let caught: unknown;
    try {
      registry.renderAll([frame], 'external', options);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ code: 'avatar.backend-unavailable', exposeMessage: true });
  });

  test('a pinned external backend that throws is not silently replaced', () => {
    const registry = new GlyphRendererRegistry({
      external: capability(() => {
        throw new Error('boom');
      }),
    });

    expect(() => registry.renderAll([frame], 'external', options)).toThrow(/Backend 'external' was requested/);
  });
});

describe('loadExternalPixelCapability', () => {
  test('returns null without a specifier', async () => {
    await expect(loadExternalPixelCapability(undefined)).resolves.toBeNull();
  });

  test('returns null when the module cannot be imported', async () => {
    const importer = vi.fn(async () => {
      throw new Error('Cannot find module');
    });

    await expect(loadExternalPixelCapability('missing-pixels', importer)).resolves.toBeNull();
    expect(importer).toHaveBeenCalledWith('missing-pixels');
  });

  test('returns null when the module has no renderFrame function', async () => {
    await expect(loadExternalPixelCapability('odd-pixels', async () => ({ render: 1 }))).resolves.toBeNull();
  });

  test('accepts a default export and validates what it returns', async () => {
    const loaded = await loadExternalPixelCapability('good-pixels', async () => ({
      default: { name: 'good', renderFrame: () => externalGrid },
    }));

    expect(loaded?.name).toBe('good');
    expect(loaded?.renderFrame(frame.bitmap, options)).toEqual(externalGrid);
  });

  test('rejects malformed grids at render time', async () => {
    const loaded = await loadExternalPixelCapability('bad-pixels', async () => ({
      renderFrame: () => ({ rows: [[{ text: 1 }]] }),
    }));

    expect(loaded?.name).toBe('bad-pixels');
    expect(() => loaded?.renderFrame(frame.bitmap, options)).toThrow();
  });
});
