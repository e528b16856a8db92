import { describe, it, expect } from 'vitest';
import { loadHtml, safeSelect, textOf } from '../document.js';

const html = `<div class="course"><a class="title">Algebra I</a></div>
<div class="course"><a class="title">Physics</a></div>`;

describe('safeSelect', () => {
  it('searches the whole document without a scope', () => {
    const $ = loadHtml(html);
    expect(safeSelect($, 'a.title').map((_, el) => $(el).text()).get()).toEqual(['Algebra I', 'Physics']);
  });

  it('searches inside the scope', () => {
    const $ = loadHtml(html);
    const second = $('div.course').last();
    expect(textOf(safeSelect($, 'a.title', second))).toBe('Physics');
  });

  it('matches nothing for an invalid selector', () => {
    const $ = loadHtml(html);
    expect(safeSelect($, 'a[href=').length).toBe(0);
  });
});
