import { describe, expect, it } from 'vitest';
import { mm } from '@statforge/contracts';
import { FONT_SETS, LEADING_GAP, createStyleSheet, fontSizeFor, isFontSetName, resolveFont } from './index.js';

describe('createStyleSheet', () => {
  it('scales nominal glyph heights by the font scale', () => {
    const sheet = createStyleSheet('standard');
    expect(sheet.title.fontSize).toBeCloseTo(mm(2.5) * 1.41);
    expect(sheet.text.fontSize).toBeCloseTo(mm(1.5) * 1.41);
  });

  it('adds the leading gap on top of the font size', () => {
    const sheet = createStyleSheet('standard');
    expect(sheet.text.leading).toBeCloseTo(sheet.text.fontSize + LEADING_GAP);
  });

  it('gives body paragraphs space before and legendary entries none', () => {
    const sheet = createStyleSheet('standard');
    expect(sheet.text.spaceBefore).toBeCloseTo(mm(1));
    expect(sheet.legendaryAction.spaceBefore).toBe(0);
  });

  it('centres and upper-cases titles', () => {
    const { title } = createStyleSheet('free');
    expect(title.alignment).toBe('center');
    expect(title.textTransform).toBe('uppercase');
    expect(title.faces.regular).toBe('Universal Serif');
  });

  it('paints subtitles white on the subtitle background', () => {
    const { subtitle } = createStyleSheet('standard', {
      border: 'black',
      background: 'white',
      footerText: 'white',
      subtitleBackground: '#123456',
    });
    expect(subtitle.color).toBe('white');
    expect(subtitle.backColor).toBe('#123456');
  });

  it('uses the body family for text and the display family for headers', () => {
    const sheet = createStyleSheet('standard');
    expect(sheet.text.faces.bold).toBe('Helvetica-Bold');
    expect(sheet.actionTitle.faces.regular).toBe('Times-Roman');
  });
});

describe('resolveFont', () => {
  it('resolves the regular face of a role', () => {
    expect(resolveFont(FONT_SETS.accurate, 'artist')).toEqual({
      font: 'ModestoTextLight',
      fontSize: fontSizeFor(FONT_SETS.accurate, 'artist'),
      color: 'white',
    });
  });
});

describe('isFontSetName', () => {
  it('accepts known sets only', () => {
    expect(isFontSetName('free')).toBe(true);
    expect(isFontSetName('toString')).toBe(false);
    expect(isFontSetName('fancy')).toBe(false);
  });
});
