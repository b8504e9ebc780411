// src/utils/markupFragment.test.ts
import { MarkupParseError, parseMarkupDocument } from './markupFragment';

const markup = `
<html><body>
  <div class="item first"><a href="/a">  Alpha  </a></div>
  <div class="item">
    <a href="javascript:void(0)"> Beta <b>bold</b> </a>
  </div>
  <div class="other item second"><a>Gamma</a></div>
  <span class="item">not a div</span>
</body></html>`;

describe('parseMarkupDocument', () => {
    it('finds every element carrying the whole class set, in document order', () => {
        const root = parseMarkupDocument(markup);

        const items = root.findAll({ tag: 'div', classes: ['item'] });
        expect(items.map(item => item.findFirst({ tag: 'a' })?.text({ strip: true }))).toEqual(['Alpha', 'Betabold', 'Gamma']);

        const second = root.findAll({ tag: 'div', classes: ['second', 'item'] });
        expect(second).toHaveLength(1);
        expect(second[0].text({ strip: true })).toBe('Gamma');
    });

    it('returns null for a missing element or attribute', () => {
        const root = parseMarkupDocument(markup);

        expect(root.findFirst({ tag: 'div', classes: ['missing'] })).toBeNull();
        const gamma = root.findFirst({ tag: 'div', classes: ['second'] })?.findFirst({ tag: 'a' });
        expect(gamma?.attr('href')).toBeNull();
    });

    it('matches attribute predicates by exact value or pattern', () => {
        const root = parseMarkupDocument(markup);

        expect(root.findFirst({ tag: 'a', attributes: { href: '/a' } })?.text()).toBe('  Alpha  ');
        expect(root.findFirst({ tag: 'a', attributes: { href: /^javascript:/ } })?.text({ strip: true })).toBe('Betabold');
        expect(root.findAll({ tag: 'a', attributes: { href: /./ } })).toHaveLength(2);
    });

    it('keeps whitespace in raw text and drops it in stripped text', () => {
        const root = parseMarkupDocument('<div class="id">P-ISSN : 1 | <span>Subject Area : Art</span> </div>');
        const block = root.findFirst({ tag: 'div', classes: ['id'] });

        expect(block?.text()).toBe('P-ISSN : 1 | Subject Area : Art ');
        expect(block?.text({ strip: true })).toBe('P-ISSN : 1 |Subject Area : Art');
    });

    it('serializes a fragment back to markup', () => {
        const root = parseMarkupDocument('<p><i class="el-globe-alt"></i>Editor</p>');

        expect(root.findFirst({ tag: 'p' })?.outerMarkup()).toBe('<p><i class="el-globe-alt"></i>Editor</p>');
    });

    it('rejects blank markup and markup without tags', () => {
        expect(() => parseMarkupDocument('   \n')).toThrow(MarkupParseError);
        expect(() => parseMarkupDocument('just some text')).toThrow('Markup contains no tags');
    });
});
