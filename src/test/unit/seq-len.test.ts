import { describe, it, expect } from 'vitest';
import {
  experimentName,
  maxModelLen,
  SEQ_LENS,
  seqLenToName,
} from '../../matrix/seq-len';

describe('seqLenToName', () => {
  it('names the standard profiles', () => {
    expect(seqLenToName(1024, 1024)).toBe('1k1k');
    expect(seqLenToName(1024, 8192)).toBe('1k8k');
    expect(seqLenToName(8192, 1024)).toBe('8k1k');
  });

  it('falls back to isl_osl for other profiles', () => {
    expect(seqLenToName(2048, 1024)).toBe('2048_1024');
  });

  it('round-trips every named profile', () => {
    for (const [name, { isl, osl }] of Object.entries(SEQ_LENS)) {
      expect(seqLenToName(isl, osl)).toBe(name);
    }
  });
});

describe('experimentName', () => {
  it('joins the model prefix and profile name', () => {
    expect(experimentName('dsr1', 8192, 1024)).toBe('dsr1_8k1k');
    expect(experimentName('llama', 512, 256)).toBe('llama_512_256');
  });
});

describe('maxModelLen', () => {
  it('adds 200 tokens of headroom', () => {
    expect(maxModelLen(1024, 1024)).toBe(2248);
    expect(maxModelLen(8192, 1024)).toBe(9416);
  });
});
