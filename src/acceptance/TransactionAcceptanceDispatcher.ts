import { UnknownTransactionTypeError } from '../errors.js';
import type { MetricSet } from '../metrics/MetricSet.js';
import type { SignedTx } from '../types/transactions.js';
import { kindOf } from './kindOf.js';

/**
 * Counts accepted transactions by the kind of their unsigned payload.
 */
export class TransactionAcceptanceDispatcher {
  constructor(private readonly metrics: Pick<MetricSet, 'txsAccepted'>) {}

  /**
   * Record one accepted transaction.
   * @throws UnknownTransactionTypeError if the unsigned payload's kind has no counter
   */
  acceptTx(tx: SignedTx): void {
    const unsignedTx = tx.unsignedTx;
    switch (unsignedTx.kind) {
      case 'addDelegator':
      case 'addSubnetValidator':
      case 'addValidator':
      case 'advanceTime':
      case 'createChain':
      case 'createSubnet':
      case 'export':
      case 'import':
      case 'rewardValidator':
        this.metrics.txsAccepted[unsignedTx.kind].inc();
        return;
      default: {
        // Reached only when the producer runs a newer taxonomy than this build
        const unknownTx: never = unsignedTx;
        throw new UnknownTransactionTypeError(kindOf(unknownTx));
      }
    }
  }
}
