import { describe, it, expect } from 'vitest';
import { MarkdownTransformer, capitalizeLine } from '../src/processors/markdown.js';

describe('MarkdownTransformer Tests', () => {
    const transformer = new MarkdownTransformer();

    describe('Bullets', () => {
        it('should turn a double hyphen into a depth-2 item', () => {
            expect(transformer.transform('--Buy milk')).toBe('  - Buy milk\n');
        });

        it('should count extra hyphens after a bullet as nesting', () => {
            expect(transformer.transform('- --nested')).toBe('    - Nested\n');
        });

        it('should grow depth by at most one level per item', () => {
            expect(transformer.transform('- a\n---b\n--c')).toBe('- A\n  - B\n  - C\n');
        });

        it('should map bullet glyphs to hyphens', () => {
            expect(transformer.transform('• first\n• second')).toBe('- First\n- Second\n');
        });

        it('should keep a horizontal rule', () => {
            expect(transformer.transform('above\n\n---\n\nbelow')).toBe('Above\n\n---\n\nBelow\n');
        });

        it('should rewrite parenthesized numbers as ordered items', () => {
            expect(transformer.transform('1) eggs')).toBe('1. Eggs\n');
        });
    });

    describe('Checkboxes', () => {
        it('should turn a bare box into a task item', () => {
            expect(transformer.transform('[ ] follow up with client')).toBe('- [ ] Follow up with client\n');
        });

        it('should map ballot box glyphs', () => {
            expect(transformer.transform('☐ call bob\n☑ pay rent')).toBe('- [ ] Call bob\n- [x] Pay rent\n');
        });

        it('should repair a misread opening bracket', () => {
            expect(transformer.transform('(] email the team')).toBe('- [ ] Email the team\n');
        });

        it('should lowercase the completion mark', () => {
            expect(transformer.transform('[X] done already')).toBe('- [x] Done already\n');
        });

        it('should map full-width brackets', () => {
            expect(transformer.transform('［ ］ buy stamps')).toBe('- [ ] Buy stamps\n');
        });

        it('should keep a task nested under a bullet', () => {
            expect(transformer.transform('- project\n--[ ] sub task')).toBe('- Project\n  - [ ] Sub task\n');
        });
    });

    describe('Headings', () => {
        it('should insert the missing space after heading markers', () => {
            expect(transformer.transform('##Title')).toBe('## Title\n');
        });

        it('should split an inline heading onto its own line', () => {
            expect(transformer.transform('notes from today ##agenda')).toBe('Notes from today\n## Agenda\n');
        });

        it('should leave inline tags alone', () => {
            expect(transformer.transform('buy milk #errand')).toBe('Buy milk #errand\n');
        });
    });

    describe('Unwrapping', () => {
        it('should merge a lowercase continuation line', () => {
            expect(transformer.transform('this is a long\nsentence that wraps\nDone.'))
                .toBe('This is a long sentence that wraps\nDone.\n');
        });

        it('should not merge after terminal punctuation', () => {
            expect(transformer.transform('first sentence.\nsecond part')).toBe('First sentence.\nSecond part\n');
        });

        it('should join a hyphenated word without a space', () => {
            expect(transformer.transform('infor-\nmation here')).toBe('Information here\n');
        });

        it('should not merge into a heading', () => {
            expect(transformer.transform('# Plan\nitems below')).toBe('# Plan\nItems below\n');
        });

        it('should keep paragraph breaks', () => {
            expect(transformer.transform('para one\n\npara two')).toBe('Para one\n\nPara two\n');
        });

        it('should merge regardless of casing in aggressive mode', () => {
            const aggressive = new MarkdownTransformer({ aggressive: true });

            expect(aggressive.transform('this is a long\nsentence that wraps\nDone.'))
                .toBe('This is a long sentence that wraps Done.\n');
        });
    });

    describe('Output', () => {
        it('should normalize line endings', () => {
            expect(transformer.transform('a\r\nb')).toBe('A b\n');
        });

        it('should drop leading blank lines', () => {
            expect(transformer.transform('\n\nhello')).toBe('Hello\n');
        });

        it('should capitalize the first letter after leading digits', () => {
            expect(transformer.transform('[ ] 2 eggs and milk\n3 apples')).toBe('- [ ] 2 Eggs and milk\n3 Apples\n');
        });

        it('should be deterministic', () => {
            const raw = '##Plan\n--Buy milk\n[ ] call bob\nsome wrapped\ntext here';

            expect(transformer.transform(raw)).toBe(transformer.transform(raw));
        });
    });

    describe('capitalizeLine', () => {
        it('should capitalize after list, checkbox and heading prefixes', () => {
            expect(capitalizeLine('## agenda')).toBe('## Agenda');
            expect(capitalizeLine('3. eggs')).toBe('3. Eggs');
            expect(capitalizeLine('  - [ ] call')).toBe('  - [ ] Call');
        });

        it('should skip leading punctuation and digits', () => {
            expect(capitalizeLine('- [x] "quoted"')).toBe('- [x] "Quoted"');
            expect(capitalizeLine('- [ ] 10 am call')).toBe('- [ ] 10 Am call');
        });

        it('should leave blank lines unchanged', () => {
            expect(capitalizeLine('')).toBe('');
        });
    });
});
