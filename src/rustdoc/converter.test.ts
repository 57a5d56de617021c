/**
 * Unit tests for the rustdoc HTML converter
 */

import { describe, it, expect } from '@jest/globals';
import {
  convertRustdocToMarkdown,
  decodeHtmlEntities,
  extractItems,
  extractMainContent,
  htmlToMarkdown,
} from './converter.js';
import { ConversionError } from '../errors/index.js';

const MODULE_PAGE =
  '<section id="main-content">' +
  '<h1>Module <a class="mod" href="#">sync</a><button>Copy</button></h1>' +
  '<p>Synchronization primitives &amp; helpers.</p>' +
  '<ul>' +
  '<li><div><a class="struct" href="struct.Mutex.html">Mutex</a></div></li>' +
  '<li><div><a class="mod" href="mpsc/index.html">mpsc</a></div></li>' +
  '</ul>' +
  '</section></main>';

describe('convertRustdocToMarkdown', () => {
  it('should convert a module page and collect its items', () => {
    const result = convertRustdocToMarkdown(MODULE_PAGE);

    expect(result.markdown).toBe('# Module sync\n\nSynchronization primitives & helpers.\n\n- Mutex\n- mpsc');
    expect(result.items).toEqual([
      { kind: 'struct', name: 'Mutex', path: [] },
      { kind: 'mod', name: 'mpsc', path: [] },
    ]);
  });

  it('should accept bytes', () => {
    const result = convertRustdocToMarkdown(Buffer.from('<p>café</p>', 'utf-8'));
    expect(result.markdown).toBe('café');
  });

  it('should reject bytes that are not UTF-8', () => {
    const invalid = new Uint8Array([0x3c, 0x70, 0x3e, 0xff, 0xfe]);

    expect(() => convertRustdocToMarkdown(invalid)).toThrow(ConversionError);
    expect(() => convertRustdocToMarkdown(invalid)).toThrow('rustdoc page is not valid UTF-8');
  });

  it('should convert pages with invalid character references', () => {
    expect(convertRustdocToMarkdown('<p>bad &#99999999; ref</p>').markdown).toBe('bad \uFFFD ref');
  });

  it('should render Rust code blocks', () => {
    const result = convertRustdocToMarkdown(
      '<pre class="rust item-decl"><code>pub struct <span>Mutex</span>&lt;T&gt;</code></pre>'
    );
    expect(result.markdown).toBe('```rust\npub struct Mutex<T>\n```');
  });
});

describe('extractMainContent', () => {
  it('should narrow to the main content section', () => {
    const html = '<nav>sidebar</nav><main><section id="main-content"><p>body</p></section></main><footer/>';
    expect(extractMainContent(html)).toBe('<section id="main-content"><p>body</p></section>');
  });

  it('should return the page unchanged without a main content section', () => {
    expect(extractMainContent('<p>plain</p>')).toBe('<p>plain</p>');
  });
});

describe('extractItems', () => {
  it('should ignore links outside the current module', () => {
    const html =
      '<a class="struct" href="../other/struct.Other.html">Other</a>' +
      '<a class="fn" href="fn.spawn.html">spawn</a>' +
      '<a class="unknown" href="unknown.x.html">x</a>';

    expect(extractItems(html)).toEqual([{ kind: 'fn', name: 'spawn', path: [] }]);
  });

  it('should list each item once', () => {
    const html = '<a class="trait" href="trait.Read.html">Read</a><a class="trait" href="trait.Read.html">Read</a>';
    expect(extractItems(html)).toEqual([{ kind: 'trait', name: 'Read', path: [] }]);
  });
});

describe('htmlToMarkdown', () => {
  it('should convert inline markup and links', () => {
    expect(htmlToMarkdown('<p>See <a href="fn.x.html"><code>x</code></a> and <strong>y</strong></p>')).toBe(
      'See [`x`](fn.x.html) and **y**'
    );
  });

  it('should number ordered lists', () => {
    expect(htmlToMarkdown('<ol><li>one</li><li>two</li></ol>')).toBe('1. one\n2. two');
  });
});

describe('decodeHtmlEntities', () => {
  it('should decode named and numeric entities', () => {
    expect(decodeHtmlEntities('&lt;T&gt; &#39;a &#x41;&#66;')).toBe("<T> 'a AB");
  });

  it('should render out-of-range numeric references as the replacement character', () => {
    expect(decodeHtmlEntities('a&#99999999;b')).toBe('a\uFFFDb');
    expect(decodeHtmlEntities('a&#x110000;b')).toBe('a\uFFFDb');
    expect(decodeHtmlEntities('a&#xD800;b')).toBe('a\uFFFDb');
    expect(decodeHtmlEntities('&#x10FFFF;')).toBe('\u{10FFFF}');
  });

  it('should decode &amp; last', () => {
    expect(decodeHtmlEntities('&amp;lt;')).toBe('&lt;');
  });
});
