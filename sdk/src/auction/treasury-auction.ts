import type { Address } from 'viem';

import type { LocalChain } from '../chain/local-chain.js';
import type { TokenLedger } from '../chain/token-ledger.js';
import { ABS_MAX_INIT_PRICE } from './constants.js';
import type { DutchAuctionParams } from './dutch-auction.js';
import { DutchAuction, isZeroAddress, requireAddress, requireInRange, validateDutchParams } from './dutch-auction.js';
import type { Epoch } from './epoch.js';
import { EmptyAssets, InvalidRecipient } from './errors.js';

export interface TreasuryAuctionConfig extends DutchAuctionParams {
  address: Address;
  paymentToken: Address;
  paymentReceiver: Address;
  initPrice: bigint;
}

export interface BuyIntent {
  assets: readonly Address[];
  assetsReceiver: Address;
  epochId: bigint;
  deadline: bigint;
  maxPaymentAmount: bigint;
}

export type TreasuryAuctionEvents = {
  Buy: { buyer: Address; assetsReceiver: Address; paymentAmount: bigint };
  Swept: { asset: Address; assetsReceiver: Address; amount: bigint };
};

function validate(cfg: TreasuryAuctionConfig): void {
  requireAddress(cfg.paymentToken, 'paymentToken');
  requireAddress(cfg.paymentReceiver, 'paymentReceiver');
  validateDutchParams(cfg);
  requireInRange('initPrice', cfg.initPrice, cfg.minInitPrice, ABS_MAX_INIT_PRICE);
}

/**
 * Dutch auction for everything the contract currently holds. The winner pays
 * the current price in `paymentToken` and receives the full balance of each
 * requested asset.
 */
export class TreasuryAuction extends DutchAuction<Epoch, TreasuryAuctionEvents> {
  public readonly config: Readonly<TreasuryAuctionConfig>;

  private readonly paymentToken: TokenLedger;

  constructor(chain: LocalChain, cfg: TreasuryAuctionConfig) {
    validate(cfg);
    super(chain, cfg.address, cfg, { epochId: 0n, initPrice: cfg.initPrice, startTime: chain.now() });

    this.config = Object.freeze({ ...cfg });
    this.paymentToken = chain.token(cfg.paymentToken);
  }

  /** Current balance the auction holds of each asset. */
  holdings(assets: readonly Address[]): Map<Address, bigint> {
    const out = new Map<Address, bigint>();
    for (const asset of assets) out.set(asset, this.chain.token(asset).balanceOf(this.address));
    return out;
  }

  buy(caller: Address, intent: BuyIntent): bigint {
    if (intent.assets.length === 0) throw new EmptyAssets();
    if (isZeroAddress(intent.assetsReceiver)) throw new InvalidRecipient('assetsReceiver');

    return this.settle(
      { epochId: intent.epochId, deadline: intent.deadline, maxPrice: intent.maxPaymentAmount },
      ({ price, next }) => {
        const assets = intent.assets.map((a) => this.chain.token(a));

        return {
          next,
          interact: () => {
            if (price > 0n) {
              this.paymentToken.transferFrom(this.address, caller, this.config.paymentReceiver, price);
            }

            for (const asset of assets) {
              const balance = asset.balanceOf(this.address);
              if (balance === 0n) continue;
              asset.transfer(this.address, intent.assetsReceiver, balance);
              this.log('Swept', { asset: asset.address, assetsReceiver: intent.assetsReceiver, amount: balance });
            }

            this.log('Buy', { buyer: caller, assetsReceiver: intent.assetsReceiver, paymentAmount: price });
          },
          result: price,
        };
      },
    );
  }
}
