/** Which topology a command expands; configs of the other kind are skipped. */
export type NodeMode = 'single-node' | 'multi-node';
