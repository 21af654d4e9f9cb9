import { describe, it, expect } from 'vitest';
import { htmlToText } from '../../src/utils/html';

describe('htmlToText', () => {
  it('strips tags and collapses whitespace', () => {
    expect(htmlToText('<p>Week <b>1</b>:</p>\n\n<ul><li>Cells</li><li>Tissues</li></ul>')).toBe(
      'Week 1 : Cells Tissues'
    );
  });

  it('drops scripts, styles and comments entirely', () => {
    expect(htmlToText('<style>p { color: red }</style><script>alert(1)</script><!-- note -->Visible')).toBe('Visible');
  });

  it('decodes named and numeric entities', () => {
    expect(htmlToText('Fish &amp; chips&nbsp;&lt;3 &#65;&#x42; &unknown;')).toBe('Fish & chips <3 AB &unknown;');
  });

  it('replaces out-of-range character references with U+FFFD', () => {
    expect(htmlToText('<p>Week 1 &#99999999; notes</p>')).toBe('Week 1 \uFFFD notes');
    expect(htmlToText('a &#x110000; b &#0; c')).toBe('a \uFFFD b \uFFFD c');
  });

  it('returns an empty string for empty input', () => {
    expect(htmlToText('')).toBe('');
  });
});
