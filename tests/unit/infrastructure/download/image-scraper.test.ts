import { describe, expect, test } from 'vitest';

import {
  extractImageItems,
  isDataUrl,
  looksLikeDirectImage,
  parseSrcset,
} from '../../../../src/infrastructure/download/image-scraper.js';

describe('parseSrcset', () => {
  test('picks the widest candidate', () => {
    expect(parseSrcset('small.jpg 320w, large.jpg 1280w, medium.jpg 640w')).toBe('large.jpg');
  });

  test('understands density descriptors', () => {
    expect(parseSrcset('a.png 1x, b.png 2.5x, c.png 2x')).toBe('b.png');
  });

  test('keeps the first candidate when nothing has a descriptor', () => {
    expect(parseSrcset('first.png, second.png')).toBe('first.png');
  });

  test('returns null for an empty srcset', () => {
    expect(parseSrcset(' , ')).toBeNull();
  });
});

describe('url helpers', () => {
  test('detects data URLs regardless of case and padding', () => {
    expect(isDataUrl('  DATA:image/png;base64,AAAA')).toBe(true);
    expect(isDataUrl('https://example.test/a.png')).toBe(false);
  });

  test('detects direct image URLs by path extension', () => {
    expect(looksLikeDirectImage('https://example.test/pics/cat.JPG?size=large')).toBe(true);
    expect(looksLikeDirectImage('https://example.test/gallery')).toBe(false);
    expect(looksLikeDirectImage('not a url')).toBe(false);
  });
});

describe('extractImageItems', () => {
  const html = `
    <html>
      <head>
        <meta property="og:image" content="/cover.jpg">
        <link rel="image_src" href="https://cdn.example.test/share.png">
      </head>
      <body>
        <img src="thumb.jpg" srcset="thumb.jpg 200w, full.jpg 1600w">
        <img data-srcset="lazy-small.webp 1x, lazy-big.webp 2x">
        <img data-src="deferred.gif">
        <img data-original="original.png">
        <img data-lazy-src="later.bmp">
        <img src="data:image/png;base64,AAAA">
        <img src="/cover.jpg">
        <img alt="no source">
      </body>
    </html>`;

  test('collects page images in document order as absolute, unique URLs', () => {
    const items = extractImageItems(html, 'https://example.test/gallery/page.html');

    expect(items.map((item) => item.url)).toEqual([
      'https://example.test/cover.jpg',
      'https://cdn.example.test/share.png',
      'https://example.test/gallery/full.jpg',
      'https://example.test/gallery/lazy-big.webp',
      'https://example.test/gallery/deferred.gif',
      'https://example.test/gallery/original.png',
      'https://example.test/gallery/later.bmp',
    ]);
  });

  test('derives filename hints from the URL path', () => {
    const items = extractImageItems('<img src="/a/b/photo.jpeg?x=1"><img src="/">', 'https://example.test/');

    expect(items).toEqual([
      { url: 'https://example.test/a/b/photo.jpeg?x=1', filenameHint: 'photo.jpeg' },
      { url: 'https://example.test/', filenameHint: 'image' },
    ]);
  });

  test('resolves relative sources against <base href>', () => {
    const items = extractImageItems(
      '<head><base href="https://static.example.test/assets/"></head><img src="pic.png">',
      'https://example.test/page',
    );

    expect(items.map((item) => item.url)).toEqual(['https://static.example.test/assets/pic.png']);
  });

  test('returns nothing for a page without images', () => {
    expect(extractImageItems('<p>hello</p>', 'https://example.test/')).toEqual([]);
  });
});
