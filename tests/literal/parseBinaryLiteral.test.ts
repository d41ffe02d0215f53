import { parseBinaryLiteral } from '../../src/literal/parseBinaryLiteral';

describe('parseBinaryLiteral', () => {
  describe('valid literals', () => {
    it('parses a single group', () => {
      expect(parseBinaryLiteral('101')).toBe('101');
      expect(parseBinaryLiteral('0')).toBe('0');
    });

    it('removes group separators', () => {
      expect(parseBinaryLiteral("100'10001010")).toBe('10010001010');
      expect(parseBinaryLiteral("01010010'00010000'00001000'00000000")).toBe(
        '01010010000100000000100000000000',
      );
    });

    it('allows surrounding whitespace', () => {
      expect(parseBinaryLiteral(" 1'0\n")).toBe('10');
    });
  });

  describe('malformed literals', () => {
    it('rejects empty input', () => {
      expect(() => parseBinaryLiteral('')).toThrow();
    });

    it('rejects non-binary digits', () => {
      expect(() => parseBinaryLiteral('102')).toThrow();
    });

    it('rejects empty groups', () => {
      expect(() => parseBinaryLiteral("1''0")).toThrow();
      expect(() => parseBinaryLiteral("'1")).toThrow();
      expect(() => parseBinaryLiteral("1'")).toThrow();
    });

    it('reports the location of the error', () => {
      let error: unknown;
      try {
        parseBinaryLiteral('10x1');
      } catch (err) {
        error = err;
      }
      expect(error).toHaveProperty('location.start.offset', 2);
    });
  });
});
