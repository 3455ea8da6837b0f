import type winston from 'winston';
import { getAddress, getContractAddress, type Address } from 'viem';
import { BondingCurve } from '../curve/BondingCurve.js';
import { DEFAULT_BASE_PRICE, DEFAULT_CREATION_FEE, TOTAL_ISSUANCE } from '../curve/constants.js';
import type { EventHub } from '../events/EventHub.js';
import { EventNotifier } from '../events/EventNotifier.js';
import type { LiquiditySeeder } from '../liquidity/LiquiditySeeder.js';
import type { ReserveBank } from '../token/ReserveBank.js';
import { TokenLedger } from '../token/TokenLedger.js';
import { createLogger } from '../utils/logger.js';
import { nowSeconds } from '../utils/timestamp.js';

export interface LaunchFactoryOptions {
    address: Address;
    /** Platform owner: owns every curve and authorizes them on the hub. */
    owner: Address;
    treasury: Address;
    reserve: ReserveBank;
    eventHub?: EventHub;
    creationFee?: bigint;
    defaultBasePrice?: bigint;
    liquiditySeeder?: LiquiditySeeder;
    logger?: winston.Logger;
}

/** Free-form project links shown next to a token. */
export interface TokenMetadata {
    description: string;
    image: string;
    website: string;
    telegram: string;
    twitter: string;
}

export interface LaunchRequest {
    name: string;
    symbol: string;
    creator: Address;
    basePrice?: bigint;
    metadata?: Partial<TokenMetadata>;
}

export interface Launch {
    name: string;
    symbol: string;
    creator: Address;
    metadata: TokenMetadata;
    tokenAddress: Address;
    token: TokenLedger;
    curve: BondingCurve;
    launchedAt: number;
}

export interface PlatformStats {
    totalLaunches: number;
    creationFee: bigint;
    basePrice: bigint;
}

/**
 * LaunchFactory — creates a token and its bonding curve in one step.
 *
 * The creator pays the creation fee to the treasury, the full issuance is
 * minted to the curve, and the curve is authorized on the event hub.
 * Addresses are derived CREATE-style from the factory address and a nonce.
 */
export class LaunchFactory {
    private readonly launches = new Map<Address, Launch>();
    private readonly notifier: EventNotifier;
    private readonly logger: winston.Logger;
    private nonce = 1n;

    constructor(private readonly options: LaunchFactoryOptions) {
        this.logger = options.logger ?? createLogger('info', 'factory');
        this.notifier = new EventNotifier(options.eventHub, options.address, this.logger);
    }

    async launch(request: LaunchRequest): Promise<Launch> {
        const name = request.name.trim();
        const symbol = request.symbol.trim();
        if (!name || !symbol) {
            throw new Error('Token name and symbol are required');
        }

        const { reserve, treasury, eventHub, owner } = this.options;
        const creationFee = this.creationFee;
        if (creationFee > 0n) {
            await reserve.transfer(request.creator, treasury, creationFee, {
                metadata: { label: 'creation fee', symbol },
            });
        }

        const tokenAddress = this.nextAddress();
        const curveAddress = this.nextAddress();
        const basePrice = request.basePrice ?? this.defaultBasePrice;

        const token = new TokenLedger(symbol);
        const curve = new BondingCurve({
            address: curveAddress,
            tokenAddress,
            token,
            reserve,
            creator: request.creator,
            treasury,
            owner,
            basePrice,
            eventHub,
            liquiditySeeder: this.options.liquiditySeeder,
            logger: this.options.logger,
        });
        await token.mint(curveAddress, TOTAL_ISSUANCE, { label: 'initial issuance' });
        eventHub?.authorizeContract(owner, curveAddress, true);

        const launchedAt = nowSeconds();
        const launch: Launch = {
            name,
            symbol,
            creator: request.creator,
            metadata: normalizeMetadata(request.metadata),
            tokenAddress,
            token,
            curve,
            launchedAt,
        };
        this.launches.set(tokenAddress, launch);

        this.notifier.tokenLaunched({
            token: tokenAddress,
            curve: curveAddress,
            creator: request.creator,
            name,
            symbol,
            basePrice,
            timestamp: launchedAt,
        });
        if (creationFee > 0n) {
            this.notifier.feeCollected({
                source: this.options.address,
                feeType: 'creation',
                amount: creationFee,
                timestamp: launchedAt,
            });
        }

        this.logger.info(`Launched ${symbol}`, { token: tokenAddress, curve: curveAddress, creator: request.creator });
        return launch;
    }

    getLaunches(): Launch[] {
        return Array.from(this.launches.values());
    }

    getLaunch(tokenAddress: Address): Launch | undefined {
        return this.launches.get(getAddress(tokenAddress));
    }

    getCurve(tokenAddress: Address): BondingCurve | undefined {
        return this.getLaunch(tokenAddress)?.curve;
    }

    getPlatformStats(): PlatformStats {
        return {
            totalLaunches: this.launches.size,
            creationFee: this.creationFee,
            basePrice: this.defaultBasePrice,
        };
    }

    private get creationFee(): bigint {
        return this.options.creationFee ?? DEFAULT_CREATION_FEE;
    }

    private get defaultBasePrice(): bigint {
        return this.options.defaultBasePrice ?? DEFAULT_BASE_PRICE;
    }

    private nextAddress(): Address {
        const address = getContractAddress({ from: this.options.address, nonce: this.nonce });
        this.nonce += 1n;
        return address;
    }
}

function normalizeMetadata(metadata: Partial<TokenMetadata> = {}): TokenMetadata {
    return {
        description: metadata.description?.trim() ?? '',
        image: metadata.image?.trim() ?? '',
        website: metadata.website?.trim() ?? '',
        telegram: metadata.telegram?.trim() ?? '',
        twitter: metadata.twitter?.trim() ?? '',
    };
}
