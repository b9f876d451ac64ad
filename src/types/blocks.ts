import type { SignedTx } from './transactions.js';

export interface BlockHeader {
  id: string;
  parentId: string;
  height: number;
}

export interface AbortBlock extends BlockHeader {
  kind: 'abort';
}

export interface AtomicBlock extends BlockHeader {
  kind: 'atomic';
  tx: SignedTx;
}

export interface CommitBlock extends BlockHeader {
  kind: 'commit';
}

export interface ProposalBlock extends BlockHeader {
  kind: 'proposal';
  tx: SignedTx;
}

export interface StandardBlock extends BlockHeader {
  kind: 'standard';
  txs: SignedTx[];
}

export type Block =
  | AbortBlock
  | AtomicBlock
  | CommitBlock
  | ProposalBlock
  | StandardBlock;

export type BlockKind = Block['kind'];
