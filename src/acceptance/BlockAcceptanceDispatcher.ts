import { UnknownBlockTypeError } from '../errors.js';
import type { MetricSet } from '../metrics/MetricSet.js';
import type { Block } from '../types/blocks.js';
import { kindOf } from './kindOf.js';
import { TransactionAcceptanceDispatcher } from './TransactionAcceptanceDispatcher.js';

/**
 * Counts accepted blocks by kind and forwards the transactions they carry.
 *
 * Abort and commit blocks carry nothing; atomic and proposal blocks carry one
 * transaction; standard blocks carry an ordered list, dispatched in order up
 * to the first failure.
 */
export class BlockAcceptanceDispatcher {
  private readonly txs: TransactionAcceptanceDispatcher;

  constructor(
    private readonly metrics: Pick<MetricSet, 'blocksAccepted' | 'txsAccepted'>,
    txs?: TransactionAcceptanceDispatcher
  ) {
    this.txs = txs ?? new TransactionAcceptanceDispatcher(metrics);
  }

  /**
   * Record one accepted block and the transactions embedded in it.
   * @throws UnknownBlockTypeError if the block kind has no counter
   * @throws UnknownTransactionTypeError from the first embedded transaction that has none
   */
  acceptBlock(block: Block): void {
    switch (block.kind) {
      case 'abort':
      case 'commit':
        this.metrics.blocksAccepted[block.kind].inc();
        return;
      case 'atomic':
      case 'proposal':
        this.metrics.blocksAccepted[block.kind].inc();
        this.txs.acceptTx(block.tx);
        return;
      case 'standard':
        this.metrics.blocksAccepted.standard.inc();
        for (const tx of block.txs) {
          this.txs.acceptTx(tx);
        }
        return;
      default: {
        const unknownBlock: never = block;
        throw new UnknownBlockTypeError(kindOf(unknownBlock));
      }
    }
  }
}
