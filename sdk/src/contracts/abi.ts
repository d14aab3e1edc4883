import { parseAbi } from 'viem';

export const MINING_AUCTION_ABI = parseAbi([
  'function mine(address miner, uint256 epochId, uint256 deadline, uint256 maxPrice, string uri) returns (uint256 price)',
  'function getPrice() view returns (uint256)',
  'function getRate() view returns (uint256)',
  'function getEpoch() view returns ((uint256 epochId, uint256 initPrice, uint256 startTime, uint256 rate, address holder, string uri))',
  'function epochPeriod() view returns (uint256)',
  'function priceMultiplier() view returns (uint256)',
  'function minInitPrice() view returns (uint256)',
  'function unitToken() view returns (address)',
  'function paymentToken() view returns (address)',
  'event Mined(address indexed sender, address indexed miner, uint256 price, string uri)',
  'event Minted(address indexed miner, uint256 amount)',
  'event FeePaid(uint8 indexed role, address indexed receiver, uint256 amount)',
  'error ZeroAddress()',
  'error InvalidRecipient()',
  'error DeadlinePassed()',
  'error EpochIdMismatch()',
  'error MaxPriceExceeded()',
  'error Reentrancy()',
]);

export const TREASURY_AUCTION_ABI = parseAbi([
  'function buy(address[] assets, address assetsReceiver, uint256 epochId, uint256 deadline, uint256 maxPaymentAmount) returns (uint256 paymentAmount)',
  'function getPrice() view returns (uint256)',
  'function getEpoch() view returns ((uint256 epochId, uint256 initPrice, uint256 startTime))',
  'function epochPeriod() view returns (uint256)',
  'function paymentToken() view returns (address)',
  'function paymentReceiver() view returns (address)',
  'event Buy(address indexed buyer, address indexed assetsReceiver, uint256 paymentAmount)',
  'error ZeroAddress()',
  'error InvalidRecipient()',
  'error DeadlinePassed()',
  'error EpochIdMismatch()',
  'error MaxPriceExceeded()',
  'error EmptyAssets()',
  'error Reentrancy()',
]);

export const ERC20_ABI = parseAbi([
  'function balanceOf(address owner) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function approve(address spender, uint256 amount) returns (bool)',
  'function decimals() view returns (uint8)',
  'function symbol() view returns (string)',
]);
