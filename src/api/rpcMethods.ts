/**
 * Platform chain JSON-RPC methods that get their own label. Anything else
 * sent as JSON-RPC shares UNKNOWN_RPC_METHOD.
 */
export const PLATFORM_RPC_METHODS = [
  'platform.getBalance',
  'platform.getBlock',
  'platform.getBlockByHeight',
  'platform.getBlockchainStatus',
  'platform.getBlockchains',
  'platform.getCurrentSupply',
  'platform.getCurrentValidators',
  'platform.getFeeConfig',
  'platform.getHeight',
  'platform.getMaxStakeAmount',
  'platform.getMinStake',
  'platform.getPendingValidators',
  'platform.getRewardUTXOs',
  'platform.getStake',
  'platform.getStakingAssetID',
  'platform.getSubnets',
  'platform.getTimestamp',
  'platform.getTotalStake',
  'platform.getTx',
  'platform.getTxStatus',
  'platform.getUTXOs',
  'platform.getValidatorsAt',
  'platform.issueTx',
  'platform.sampleValidators',
  'platform.validatedBy',
  'platform.validates'
] as const;

export const UNKNOWN_RPC_METHOD = 'unknown_rpc_method';
export const UNMATCHED_ROUTE = 'unmatched';
