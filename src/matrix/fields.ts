/**
 * Every key that appears in a config file, a runner inventory lookup, or an
 * emitted matrix entry. Lookups go through this enum rather than bare strings.
 */
export enum Field {
  // Config entry
  Image = 'image',
  Model = 'model',
  ModelPrefix = 'model-prefix',
  Precision = 'precision',
  Framework = 'framework',
  Runner = 'runner',
  Multinode = 'multinode',
  Disagg = 'disagg',
  SeqLenConfigs = 'seq-len-configs',

  // Sequence-length profile
  Isl = 'isl',
  Osl = 'osl',
  SearchSpace = 'search-space',

  // Search-space point
  Tp = 'tp',
  Ep = 'ep',
  DpAttn = 'dp-attn',
  SpecDecoding = 'spec-decoding',
  ConcStart = 'conc-start',
  ConcEnd = 'conc-end',
  ConcList = 'conc-list',
  Prefill = 'prefill',
  Decode = 'decode',
  NumWorker = 'num-worker',
  AdditionalSettings = 'additional-settings',

  // Matrix entry only
  Conc = 'conc',
  MaxModelLen = 'max-model-len',
  ExpName = 'exp-name',
  RunEval = 'run-eval',
}
