import { ByteCount } from '../src/ByteCount';
import { Eos } from '../src/Eos';

describe('Eos', () => {
  it('is reached only with zero bytes to come', () => {
    expect(Eos.reached().isReached()).toBe(true);
    expect(Eos.of(true).isReached()).toBe(true);
    expect(Eos.notReached().isReached()).toBe(false);
    expect(Eos.withRemainingBytes(ByteCount.finite(1)).isReached()).toBe(false);
    expect(Eos.withRemainingBytes(ByteCount.INFINITE).isReached()).toBe(false);
  });

  it('reserves trailing bytes with back', () => {
    const eos = Eos.reached().back(2);
    expect(eos.isReached()).toBe(false);
    expect(eos.remainingBytes.toNumber()).toBe(2);
  });

  it('keeps an unknown count unknown', () => {
    expect(Eos.notReached().back(2).remainingBytes.isUnknown()).toBe(true);
  });

  it('returns itself when nothing is reserved', () => {
    const eos = Eos.reached();
    expect(eos.back(0)).toBe(eos);
  });
});
