/**
 * Platform chain transactions, as handed over by the transaction layer once
 * they have been accepted. Only the fields that identify a transaction are
 * modelled; validation and serialization live upstream.
 */

export interface TransferableOutput {
  assetId: string;
  amount: bigint;
  owners: string[];
}

export interface TransferableInput {
  txId: string;
  outputIndex: number;
  assetId: string;
  amount: bigint;
}

export interface StakerPeriod {
  nodeId: string;
  startTime: number; // unix seconds
  endTime: number; // unix seconds
  weight: bigint;
}

export interface AddDelegatorTx {
  kind: 'addDelegator';
  validator: StakerPeriod;
  stake: TransferableOutput[];
  rewardsOwner: string;
}

export interface AddSubnetValidatorTx {
  kind: 'addSubnetValidator';
  validator: StakerPeriod;
  subnetId: string;
}

export interface AddValidatorTx {
  kind: 'addValidator';
  validator: StakerPeriod;
  stake: TransferableOutput[];
  rewardsOwner: string;
  delegationShares: number;
}

export interface AdvanceTimeTx {
  kind: 'advanceTime';
  time: number; // unix seconds
}

export interface CreateChainTx {
  kind: 'createChain';
  subnetId: string;
  chainName: string;
  vmId: string;
  genesisData: Uint8Array;
}

export interface CreateSubnetTx {
  kind: 'createSubnet';
  owners: string[];
  threshold: number;
}

export interface ExportTx {
  kind: 'export';
  destinationChain: string;
  exportedOutputs: TransferableOutput[];
}

export interface ImportTx {
  kind: 'import';
  sourceChain: string;
  importedInputs: TransferableInput[];
}

export interface RewardValidatorTx {
  kind: 'rewardValidator';
  txId: string; // the staker transaction being rewarded
}

export type UnsignedTx =
  | AddDelegatorTx
  | AddSubnetValidatorTx
  | AddValidatorTx
  | AdvanceTimeTx
  | CreateChainTx
  | CreateSubnetTx
  | ExportTx
  | ImportTx
  | RewardValidatorTx;

export type TxKind = UnsignedTx['kind'];

export interface Credential {
  signatures: string[];
}

export interface SignedTx {
  id: string;
  unsignedTx: UnsignedTx;
  credentials: Credential[];
}
