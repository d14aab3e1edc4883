// Math
export { WAD, BPS_DIVISOR, mulDiv, bpsMul, wadMul, clamp, wadToDecimal } from './math/wad.js';
export { priceAt, secondsUntilPrice, PriceClock } from './math/price.js';
export { accruedEmission, emissionRate, EmissionSchedule, MAX_HALVING_SHIFT } from './math/emission.js';
export {
  splitFee,
  miningFeeWeights,
  PREVIOUS_HOLDER_FEE_BPS,
  TEAM_FEE_BPS,
  PROTOCOL_FEE_BPS,
  type FeeRole,
  type FeeWeight,
  type FeeShare,
} from './math/fees.js';

// Auctions
export * from './auction/constants.js';
export * from './auction/errors.js';
export { EpochLedger, ReentrancyGuard, nextInitPrice, type Epoch } from './auction/epoch.js';
export {
  DutchAuction,
  type DutchAuctionParams,
  type SettleIntent,
  type SettleContext,
  type SettlePlan,
} from './auction/dutch-auction.js';
export {
  MiningAuction,
  type MiningAuctionConfig,
  type MiningAuctionEvents,
  type MiningEpoch,
  type MineIntent,
} from './auction/mining-auction.js';
export {
  TreasuryAuction,
  type TreasuryAuctionConfig,
  type TreasuryAuctionEvents,
  type BuyIntent,
} from './auction/treasury-auction.js';

// In-process chain
export { ManualClock, SystemClock, type Clock } from './chain/clock.js';
export { TypedEmitter, type EventMap, type Unsubscribe } from './chain/emitter.js';
export { LocalChain } from './chain/local-chain.js';
export type { Participant } from './chain/participant.js';
export { TokenLedger, type TokenLedgerOptions, type TokenTransfer, type TransferHook } from './chain/token-ledger.js';
export { StaticFeeSource, type ProtocolFeeSource } from './chain/fee-source.js';

// Contract bindings
export { DutchmineClient } from './contracts/client.js';
export {
  MiningAuctionContract,
  type MiningAuctionState,
  type MiningEpochView,
  type PreparedCall,
} from './contracts/mining-auction.js';
export {
  TreasuryAuctionContract,
  type TreasuryAuctionState,
  type TreasuryEpochView,
} from './contracts/treasury-auction.js';
export { ERC20Contract } from './contracts/erc20.js';
export { decodeAuctionRevert } from './contracts/errors.js';
export { MINING_AUCTION_ABI, TREASURY_AUCTION_ABI, ERC20_ABI } from './contracts/abi.js';

// Types
export type { DutchmineDeployment } from './types/config.js';
