import { extractSku, normalizeSku } from '@/modules/catalog/domain/sku';

describe('extractSku', () => {
  it('reads the token between tags', () => {
    expect(extractSku('<p>Ref: <strong>FZ8117-100</strong></p>')).toBe('FZ8117-100');
  });

  it('returns the first token when several are present', () => {
    expect(extractSku('<ul><li>AAA-1</li><li>BBB-2</li></ul>')).toBe('AAA-1');
  });

  it('ignores lowercase or spaced text', () => {
    expect(extractSku('<p>Color: Red</p>')).toBe('');
    expect(extractSku('<b>abc123</b>')).toBe('');
  });

  it('skips non-matching segments and finds a later token', () => {
    expect(extractSku('<p>Sizing guide</p><span>DD1391-100</span>')).toBe('DD1391-100');
  });

  it('returns empty for missing markup', () => {
    expect(extractSku('')).toBe('');
    expect(extractSku(undefined)).toBe('');
    expect(extractSku(42)).toBe('');
  });
});

describe('normalizeSku', () => {
  it('trims and uppercases', () => {
    expect(normalizeSku(' dd1391-100 ')).toBe('DD1391-100');
  });
});
