import type { Address } from 'viem';

import type { ProtocolFeeSource } from '../chain/fee-source.js';
import type { LocalChain } from '../chain/local-chain.js';
import type { TokenLedger } from '../chain/token-ledger.js';
import { EmissionSchedule, accruedEmission } from '../math/emission.js';
import type { FeeRole, FeeShare } from '../math/fees.js';
import { miningFeeWeights, splitFee } from '../math/fees.js';
import { MAX_HALVING_PERIOD, MAX_INITIAL_RATE, MIN_HALVING_PERIOD } from './constants.js';
import type { DutchAuctionParams } from './dutch-auction.js';
import {
  DutchAuction,
  isZeroAddress,
  requireAddress,
  requireInRange,
  validateDutchParams,
} from './dutch-auction.js';
import type { Epoch } from './epoch.js';
import { InvalidRecipient, ZeroAddress } from './errors.js';

export interface MiningEpoch extends Epoch {
  /** Emission rate fixed when this epoch opened; used to mint for its holder. */
  readonly rate: bigint;
  readonly holder: Address;
  readonly uri: string;
}

export interface MiningAuctionConfig extends DutchAuctionParams {
  address: Address;
  unitToken: Address;
  paymentToken: Address;
  treasury: Address;
  /** Optional: the zero address disables the team share. */
  team: Address;
  feeSource: ProtocolFeeSource;
  /** Holder of epoch 0. Defaults to `team`. */
  initialHolder?: Address;
  uri: string;
  initialRate: bigint;
  tailRate: bigint;
  halvingPeriod: bigint;
}

export interface MineIntent {
  miner: Address;
  epochId: bigint;
  deadline: bigint;
  maxPrice: bigint;
  uri: string;
}

export type MiningAuctionEvents = {
  Mined: { sender: Address; miner: Address; price: bigint; uri: string };
  Minted: { miner: Address; amount: bigint };
  FeePaid: { role: FeeRole; receiver: Address; amount: bigint };
};

function validate(cfg: MiningAuctionConfig): void {
  requireAddress(cfg.unitToken, 'unitToken');
  requireAddress(cfg.paymentToken, 'paymentToken');
  requireAddress(cfg.treasury, 'treasury');
  requireAddress(cfg.feeSource.address, 'feeSource');
  requireInRange('initialRate', cfg.initialRate, 1n, MAX_INITIAL_RATE);
  requireInRange('tailRate', cfg.tailRate, 1n, cfg.initialRate);
  requireInRange('halvingPeriod', cfg.halvingPeriod, MIN_HALVING_PERIOD, MAX_HALVING_PERIOD);
  validateDutchParams(cfg);
}

/**
 * Continuous Dutch auction for the right to receive token emissions.
 *
 * Each `mine` pays the current price, mints `heldDuration × rate` to the
 * displaced holder and splits the payment across previous holder, team,
 * protocol and treasury.
 */
export class MiningAuction extends DutchAuction<MiningEpoch, MiningAuctionEvents> {
  public readonly config: Readonly<MiningAuctionConfig>;
  public readonly schedule: EmissionSchedule;

  private readonly unitToken: TokenLedger;
  private readonly paymentToken: TokenLedger;

  constructor(chain: LocalChain, cfg: MiningAuctionConfig) {
    validate(cfg);

    const holder = cfg.initialHolder ?? cfg.team;
    if (isZeroAddress(holder)) throw new ZeroAddress('initialHolder');

    const now = chain.now();
    super(chain, cfg.address, cfg, {
      epochId: 0n,
      initPrice: cfg.minInitPrice,
      startTime: now,
      rate: cfg.initialRate,
      holder,
      uri: cfg.uri,
    });

    this.config = Object.freeze({ ...cfg });
    this.schedule = new EmissionSchedule(cfg.initialRate, cfg.tailRate, cfg.halvingPeriod, now);
    this.unitToken = chain.token(cfg.unitToken);
    this.paymentToken = chain.token(cfg.paymentToken);
  }

  getRate(): bigint {
    return this.schedule.rateAt(this.chain.now());
  }

  /** Emissions the current holder would receive if displaced now. */
  pendingEmission(): bigint {
    const e = this.ledger.current;
    return accruedEmission(e.startTime, e.rate, this.chain.now());
  }

  /** Fee shares a settle at `price` would pay right now. */
  previewFees(price: bigint): FeeShare[] {
    return splitFee(
      price,
      miningFeeWeights({
        previousHolder: this.ledger.current.holder,
        team: this.config.team,
        protocol: this.config.feeSource.protocolFeeReceiver(),
      }),
      { role: 'treasury', receiver: this.config.treasury },
    );
  }

  mine(caller: Address, intent: MineIntent): bigint {
    if (isZeroAddress(intent.miner)) throw new InvalidRecipient('miner');

    return this.settle(intent, ({ previous, price, now, next }) => {
      const mintAmount = accruedEmission(previous.startTime, previous.rate, now);
      const shares = this.previewFees(price);

      return {
        next: { ...next, rate: this.schedule.rateAt(now), holder: intent.miner, uri: intent.uri },
        interact: () => {
          this.log('Mined', { sender: caller, miner: intent.miner, price, uri: intent.uri });

          if (mintAmount > 0n) {
            this.unitToken.mint(this.address, previous.holder, mintAmount);
            this.log('Minted', { miner: previous.holder, amount: mintAmount });
          }

          for (const share of shares) {
            if (share.amount === 0n || isZeroAddress(share.receiver)) continue;
            this.paymentToken.transferFrom(this.address, caller, share.receiver, share.amount);
            this.log('FeePaid', share);
          }
        },
        result: price,
      };
    });
  }
}
