// Test fixtures: accepted blocks and transactions, plus counter readers
import type { Counter } from 'prom-client';

import type { MetricSet } from '../../src/metrics/MetricSet.js';
import type { Block, BlockHeader } from '../../src/types/blocks.js';
import type {
  SignedTx,
  StakerPeriod,
  TransferableOutput,
  TxKind,
  UnsignedTx
} from '../../src/types/transactions.js';

const staker = (): StakerPeriod => ({
  nodeId: 'NodeID-test-1',
  startTime: 1_700_000_000,
  endTime: 1_701_209_600,
  weight: 2_000_000_000_000n
});

const output = (amount: bigint): TransferableOutput => ({
  assetId: 'asset-test',
  amount,
  owners: ['owner-test']
});

export const unsignedTxs: { [K in TxKind]: () => Extract<UnsignedTx, { kind: K }> } = {
  addDelegator: () => ({
    kind: 'addDelegator',
    validator: staker(),
    stake: [output(25_000_000_000n)],
    rewardsOwner: 'owner-test'
  }),
  addSubnetValidator: () => ({
    kind: 'addSubnetValidator',
    validator: staker(),
    subnetId: 'subnet-test'
  }),
  addValidator: () => ({
    kind: 'addValidator',
    validator: staker(),
    stake: [output(2_000_000_000_000n)],
    rewardsOwner: 'owner-test',
    delegationShares: 20_000
  }),
  advanceTime: () => ({ kind: 'advanceTime', time: 1_700_000_060 }),
  createChain: () => ({
    kind: 'createChain',
    subnetId: 'subnet-test',
    chainName: 'test-chain',
    vmId: 'vm-test',
    genesisData: new Uint8Array([1, 2, 3])
  }),
  createSubnet: () => ({ kind: 'createSubnet', owners: ['owner-test'], threshold: 1 }),
  export: () => ({
    kind: 'export',
    destinationChain: 'chain-x',
    exportedOutputs: [output(1_000n)]
  }),
  import: () => ({
    kind: 'import',
    sourceChain: 'chain-x',
    importedInputs: [{ txId: 'tx-source', outputIndex: 0, assetId: 'asset-test', amount: 1_000n }]
  }),
  rewardValidator: () => ({ kind: 'rewardValidator', txId: 'tx-staker' })
};

export const TX_KINDS = Object.keys(unsignedTxs).filter((k): k is TxKind => k in unsignedTxs);
export const BLOCK_KINDS = ['abort', 'atomic', 'commit', 'proposal', 'standard'] as const;

export function signedTx(kind: TxKind, id = `tx-${kind}`): SignedTx {
  return {
    id,
    unsignedTx: unsignedTxs[kind](),
    credentials: [{ signatures: ['sig-placeholder'] }]
  };
}

/**
 * A signed transaction whose payload kind this build does not know, as it
 * would arrive from a newer producer.
 */
export function foreignTx(kind: string, id = `tx-${kind}`): SignedTx {
  return JSON.parse(JSON.stringify({
    id,
    unsignedTx: { kind },
    credentials: []
  }));
}

let height = 0;
function header(): BlockHeader {
  height += 1;
  return { id: `blk-${height}`, parentId: `blk-${height - 1}`, height };
}

export const blocks = {
  abort: (): Block => ({ kind: 'abort', ...header() }),
  commit: (): Block => ({ kind: 'commit', ...header() }),
  atomic: (tx: SignedTx): Block => ({ kind: 'atomic', tx, ...header() }),
  proposal: (tx: SignedTx): Block => ({ kind: 'proposal', tx, ...header() }),
  standard: (txs: SignedTx[]): Block => ({ kind: 'standard', txs, ...header() })
};

export function foreignBlock(kind: string): Block {
  return JSON.parse(JSON.stringify({ kind, ...header() }));
}

/**
 * A block whose kind tag is not a string at all, e.g. a bigint from a
 * mis-decoded payload.
 */
export function foreignBlockWithKind(kind: unknown): Block {
  const block: Block = JSON.parse(JSON.stringify({ kind: 'abort', ...header() }));
  Reflect.set(block, 'kind', kind);
  return block;
}

export async function counterValue(counter: Counter): Promise<number> {
  const { values } = await counter.get();
  return values[0]?.value ?? 0;
}

/**
 * Every acceptance counter keyed as "block:<kind>" or "tx:<kind>".
 */
export async function counterSnapshot(metrics: MetricSet): Promise<Record<string, number>> {
  const snapshot: Record<string, number> = {};
  for (const kind of BLOCK_KINDS) {
    snapshot[`block:${kind}`] = await counterValue(metrics.blocksAccepted[kind]);
  }
  for (const kind of TX_KINDS) {
    snapshot[`tx:${kind}`] = await counterValue(metrics.txsAccepted[kind]);
  }
  return snapshot;
}

/**
 * All-zero snapshot with the given counters overridden.
 */
export function expectedSnapshot(overrides: Record<string, number> = {}): Record<string, number> {
  const snapshot: Record<string, number> = {};
  for (const kind of BLOCK_KINDS) snapshot[`block:${kind}`] = 0;
  for (const kind of TX_KINDS) snapshot[`tx:${kind}`] = 0;
  return { ...snapshot, ...overrides };
}
