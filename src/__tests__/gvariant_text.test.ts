import { parseGVariantText, parseStringLiteral } from '../core/parser/gvariant_text';

describe('parseGVariantText', () => {
  it('decodes quoted strings', () => {
    expect(parseGVariantText("'Cantarell 11'\n")).toEqual({ kind: 'string', value: 'Cantarell 11' });
    expect(parseGVariantText('"it\'s"')).toEqual({ kind: 'string', value: "it's" });
  });

  it('decodes doubles, which always carry a point or exponent', () => {
    expect(parseGVariantText('1.0\n')).toEqual({ kind: 'float', value: 1 });
    expect(parseGVariantText('1.25')).toEqual({ kind: 'float', value: 1.25 });
    expect(parseGVariantText('1e-05')).toEqual({ kind: 'float', value: 0.00001 });
  });

  it('decodes integers with or without a type prefix', () => {
    expect(parseGVariantText('42')).toEqual({ kind: 'int', value: 42 });
    expect(parseGVariantText('uint32 5')).toEqual({ kind: 'int', value: 5 });
    expect(parseGVariantText('byte 0x10')).toEqual({ kind: 'int', value: 16 });
  });

  it('decodes booleans', () => {
    expect(parseGVariantText('true')).toEqual({ kind: 'bool', value: true });
    expect(parseGVariantText('false')).toEqual({ kind: 'bool', value: false });
  });

  it('leaves containers undecoded', () => {
    expect(parseGVariantText('@as []')).toEqual({ kind: 'other', text: '@as []' });
    expect(parseGVariantText("['a', 'b']")).toEqual({ kind: 'other', text: "['a', 'b']" });
  });
});

describe('parseStringLiteral', () => {
  it('handles escapes', () => {
    expect(parseStringLiteral("'a\\'b'")).toBe("a'b");
    expect(parseStringLiteral("'tab\\there'")).toBe('tab\there');
    expect(parseStringLiteral("'\\u00e9'")).toBe('é');
  });

  it('rejects text that is not a single literal', () => {
    expect(parseStringLiteral('plain')).toBeNull();
    expect(parseStringLiteral("'a' 'b'")).toBeNull();
    expect(parseStringLiteral("'")).toBeNull();
  });
});
