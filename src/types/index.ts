export type {
  AbortBlock,
  AtomicBlock,
  Block,
  BlockHeader,
  BlockKind,
  CommitBlock,
  ProposalBlock,
  StandardBlock
} from './blocks.js';

export type {
  AddDelegatorTx,
  AddSubnetValidatorTx,
  AddValidatorTx,
  AdvanceTimeTx,
  CreateChainTx,
  CreateSubnetTx,
  Credential,
  ExportTx,
  ImportTx,
  RewardValidatorTx,
  SignedTx,
  StakerPeriod,
  TransferableInput,
  TransferableOutput,
  TxKind,
  UnsignedTx
} from './transactions.js';
