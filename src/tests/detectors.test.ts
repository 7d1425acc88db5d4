import { EvmDetector, SolanaDetector, createDetectors } from '../services/detectors';
import { hasMixedCharacters } from '../services/detectors/solana';
import ignoreList from '../services/detectors/solanaIgnoreList.json';
import { Chain } from '../types/mentions';

const SOL_A = 'Gx7kPq2Rt9VbNm4HcWz8YfJd3LsEa6TuQp5MnBv1Kr';
const SOL_B = 'Hr3tYw8ZkQ2mVb6NcXp9JfLd4GsUa7EeRq1TnWv5Mz';
const EVM_CHECKSUM = '0x5A7b9C1d3E5f7A9b1C3d5E7f9A1b3C5d7E9f1A3B';
const EVM_LOWER = '0x5a7b9c1d3e5f7a9b1c3d5e7f9a1b3c5d7e9f1a3b';

describe('SolanaDetector', () => {
  const detector = new SolanaDetector();

  it('should find base58 addresses in order of appearance', () => {
    expect(detector.detect(`ape ${SOL_B} now, also ${SOL_A}`)).toEqual([SOL_B, SOL_A]);
  });

  it('should report an address once per message', () => {
    expect(detector.detect(`${SOL_A} ${SOL_A}\nCA: ${SOL_A}`)).toEqual([SOL_A]);
  });

  it('should skip system program addresses', () => {
    expect(detector.detect('wrapped So11111111111111111111111111111111111111112 here')).toEqual([]);
    expect(detector.detect('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA')).toEqual([]);
  });

  it('should skip every address on the ignore list', () => {
    expect(ignoreList.systemAddresses.length).toBeGreaterThan(0);
    for (const address of ignoreList.systemAddresses) {
      expect(detector.detect(`CA: ${address}`)).toEqual([]);
    }
  });

  it('should skip candidates without upper case, lower case and digits', () => {
    expect(detector.detect('ABCDEFGHJKMNPQRSTUVWXYZ23456789ABCDEFGH')).toEqual([]);
    expect(detector.detect('abcdefghijkmnopqrstuvwxyzabcdefghijkmnop')).toEqual([]);
  });

  it('should ignore runs that are too short or too long', () => {
    expect(detector.detect('Short7kPq2Rt9VbNm4HcWz8YfJd3L')).toEqual([]);
    expect(detector.detect(`${SOL_A}Gx7kPq2R`)).toEqual([]);
  });

  it('should return nothing for plain chatter', () => {
    expect(detector.detect('Bullish on Solana, Jupiter and Raydium this week')).toEqual([]);
  });

  it('should expose its chain', () => {
    expect(detector.chain).toBe(Chain.SOLANA);
  });
});

describe('hasMixedCharacters', () => {
  it('should require all three character classes', () => {
    expect(hasMixedCharacters('aB3')).toBe(true);
    expect(hasMixedCharacters('aB')).toBe(false);
    expect(hasMixedCharacters('a3')).toBe(false);
    expect(hasMixedCharacters('B3')).toBe(false);
  });
});

describe('EvmDetector', () => {
  const detector = new EvmDetector();

  it('should normalise addresses to lower case', () => {
    expect(detector.detect(`buy ${EVM_CHECKSUM} on base`)).toEqual([EVM_LOWER]);
  });

  it('should treat different spellings of one address as a single contract', () => {
    expect(detector.detect(`${EVM_CHECKSUM} / ${EVM_LOWER}`)).toEqual([EVM_LOWER]);
  });

  it('should skip burn and zero addresses', () => {
    expect(detector.detect('0x0000000000000000000000000000000000000000')).toEqual([]);
    expect(detector.detect('0x000000000000000000000000000000000000dEaD')).toEqual([]);
    expect(detector.detect('0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF')).toEqual([]);
  });

  it('should ignore hex runs of the wrong length', () => {
    expect(detector.detect('0x5a7b9c1d3e5f7a9b1c3d5e7f9a1b3c5d7e9f1a')).toEqual([]);
    expect(detector.detect(`${EVM_LOWER}ff`)).toEqual([]);
  });
});

describe('createDetectors', () => {
  it('should build one detector per known chain', () => {
    expect(createDetectors().map(detector => detector.chain)).toEqual([Chain.SOLANA, Chain.EVM]);
  });

  it('should find both chains in one message', () => {
    const text = `sol: ${SOL_A}\neth: ${EVM_CHECKSUM}`;
    const found = createDetectors().map(detector => [detector.chain, detector.detect(text)]);

    expect(found).toEqual([
      [Chain.SOLANA, [SOL_A]],
      [Chain.EVM, [EVM_LOWER]]
    ]);
  });
});
