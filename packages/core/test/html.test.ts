import { describe, it, expect } from 'vitest';
import { escapeHtml } from '../src/html.js';

describe('escapeHtml', () => {
  it('should escape the five HTML-special characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;');
  });

  it('should leave plain text alone', () => {
    expect(escapeHtml('Day 2 notes')).toBe('Day 2 notes');
  });
});
