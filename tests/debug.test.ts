import { debugAssert, debugAssertionsEnabled, setDebugAssertions } from '../src/debug';
import { UintN } from '../src/UintN';
import { u8 } from '../src/words';

describe('debug assertions', () => {
  afterEach(() => {
    setDebugAssertions(false);
  });

  it('are off by default', () => {
    expect(debugAssertionsEnabled()).toBe(false);
  });

  it('reads UINT_N_DEBUG when the module loads', () => {
    const saved = process.env.UINT_N_DEBUG;
    process.env.UINT_N_DEBUG = 'true';
    try {
      jest.isolateModules(() => {
        const fresh: typeof import('../src/debug') = require('../src/debug');
        expect(fresh.debugAssertionsEnabled()).toBe(true);
      });
    } finally {
      if (saved === undefined) {
        delete process.env.UINT_N_DEBUG;
      } else {
        process.env.UINT_N_DEBUG = saved;
      }
    }
  });

  describe('debugAssert', () => {
    it('does not evaluate its arguments when disabled', () => {
      const condition = jest.fn(() => false);
      const message = jest.fn(() => 'unused');
      debugAssert(condition, message);
      expect(condition).not.toHaveBeenCalled();
      expect(message).not.toHaveBeenCalled();
    });

    it('throws a prefixed error when enabled', () => {
      setDebugAssertions(true);
      expect(() => debugAssert(() => false, () => 'boom')).toThrow('UintN: boom');
      expect(() => debugAssert(() => true, () => 'boom')).not.toThrow();
    });
  });

  describe('UintN contract checks', () => {
    it('skip bounds checks by default', () => {
      const x = UintN.zero(11, u8);
      expect(() => x.test(11)).not.toThrow();
    });

    it('reject out-of-range bit indices', () => {
      setDebugAssertions(true);
      const x = UintN.zero(11, u8);
      expect(() => x.test(11)).toThrow('bit index 11 out of range [0, 11)');
      expect(() => x.set(-1)).toThrow('bit index -1 out of range [0, 11)');
      expect(() => x.unset(1.5)).toThrow('out of range');
      expect(() => x.set(10)).not.toThrow();
    });

    it('reject negative shift amounts', () => {
      setDebugAssertions(true);
      expect(() => UintN.zero(8, u8).shiftLeftAssign(-1)).toThrow(
        'shift amount must be a non-negative integer, got -1',
      );
    });

    it('reject AND across widths', () => {
      setDebugAssertions(true);
      const nine: number = 9;
      const ten: number = 10;
      const a = UintN.zero(nine, u8);
      const b = UintN.zero(ten, u8);
      expect(() => a.andAssign(b)).toThrow('cannot AND uint10/u8 into uint9/u8');
    });

    it('reject words outside the word type', () => {
      setDebugAssertions(true);
      expect(() => UintN.fromWord(8, 256, u8)).toThrow('256 is not a valid u8 word');
      expect(() => UintN.fromWords(9, [1, -1], u8)).toThrow('-1 is not a valid u8 word');
    });
  });
});
