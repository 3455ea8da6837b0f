#!/usr/bin/env node

import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { loadConfig, type LaunchpadConfig } from './config/index.js';
import { isCurveError } from './curve/CurveError.js';
import { CurvePricer } from './curve/CurvePricer.js';
import { TradeSizer } from './curve/TradeSizer.js';
import { EventHub } from './events/EventHub.js';
import { LaunchFactory } from './launch/LaunchFactory.js';
import { ReserveBank } from './token/ReserveBank.js';
import { Treasury } from './token/Treasury.js';
import { createLogger } from './utils/logger.js';
import { formatAmount, parseAmount } from './utils/units.js';

function option(args: string[], name: string): string | undefined {
    const idx = args.indexOf(name);
    return idx !== -1 ? args[idx + 1] : undefined;
}

function sizerFor(config: LaunchpadConfig, args: string[]): { pricer: CurvePricer; sizer: TradeSizer } {
    const basePrice = option(args, '--base-price');
    const pricer = new CurvePricer(basePrice ? parseAmount(basePrice) : config.basePrice);
    return { pricer, sizer: new TradeSizer(pricer) };
}

async function simulate(config: LaunchpadConfig, args: string[]): Promise<void> {
    const wallets = parseInt(option(args, '--wallets') ?? '50');
    const perBuy = parseAmount(option(args, '--amount') ?? '1000');
    const logger = createLogger(config.logLevel, 'simulate');

    const reserve = new ReserveBank();
    const treasury = new Treasury(config.treasury, config.owner, reserve, logger);
    const hub = new EventHub(config.owner);
    const factory = new LaunchFactory({
        address: config.factory,
        owner: config.owner,
        treasury: config.treasury,
        reserve,
        eventHub: hub,
        creationFee: config.creationFee,
        defaultBasePrice: config.basePrice,
        logger,
    });
    hub.authorizeContract(config.owner, config.factory, true);

    const creator = privateKeyToAccount(generatePrivateKey()).address;
    if (config.creationFee > 0n) await reserve.deposit(creator, config.creationFee);
    const { curve, symbol } = await factory.launch({ name: 'Simulated Token', symbol: 'SIM', creator });

    let trades = 0;
    for (let i = 0; i < wallets && !curve.isGraduated(); i++) {
        const trader = privateKeyToAccount(generatePrivateKey()).address;
        await reserve.deposit(trader, perBuy * 100n);
        while (!curve.isGraduated()) {
            try {
                await curve.buy(trader, perBuy);
                trades++;
            } catch (err) {
                if (isCurveError(err, 'PURCHASE_LIMIT') || isCurveError(err, 'INSUFFICIENT_BALANCE')) break;
                throw err;
            }
        }
    }

    const state = curve.getDetailedState();
    console.log(`\n📈 ${symbol} simulation (${trades} buys)`);
    console.log(`   Price:      ${formatAmount(state.currentPrice)}`);
    console.log(`   Raised:     ${formatAmount(state.totalRaised)} (${state.graduationProgress}%)`);
    console.log(`   Reserve:    ${formatAmount(state.currentReserve)}`);
    console.log(`   Units sold: ${formatAmount(state.unitsSold)}`);
    console.log(`   Graduated:  ${state.graduated ? 'yes' : 'no'}`);
    const fees = await treasury.getTreasuryStats();
    const platform = factory.getPlatformStats();
    console.log(`   Treasury:   ${formatAmount(fees.currentBalance)} (received ${formatAmount(fees.totalReceived)})`);
    console.log(`   Launches:   ${platform.totalLaunches}`);
    console.log(`   Events:     ${hub.getEvents().length}`);
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];

    if (!command || command === 'help' || command === '--help') {
        console.log(`
Launchpad — bonding-curve settlement core

Usage:
  launchpad price [--sold <tokens>]                        Spot price after <tokens> sold
  launchpad quote-buy <reserve> [--sold <tokens>]          Tokens received for a buy
  launchpad quote-sell <tokens> --sold <tokens>            Reserve paid out for a sell
  launchpad simulate [--wallets n] [--amount <reserve>]    Launch a token and buy until graduation

Options:
  --config <file>        JSON config (basePrice, creationFee, owner, treasury, factory, logLevel)
  --base-price <amount>  Override the curve's base price
        `.trim());
        process.exit(0);
    }

    const config = loadConfig(option(args, '--config'));
    const sold = parseAmount(option(args, '--sold') ?? '0');

    if (command === 'price') {
        const { pricer } = sizerFor(config, args);
        console.log(`Price at ${formatAmount(sold)} sold: ${formatAmount(pricer.priceAt(sold))}`);
        console.log(`Progress: ${formatAmount(pricer.progressOf(sold) * 100n)}%`);
        return;
    }

    if (command === 'quote-buy' || command === 'quote-sell') {
        const amount = args[1];
        if (!amount || amount.startsWith('--')) {
            console.error(`Error: ${command} needs an amount`);
            process.exit(1);
        }
        const { sizer } = sizerFor(config, args);

        if (command === 'quote-buy') {
            const quote = sizer.quoteBuy(sold, parseAmount(amount));
            console.log(`Tokens out:  ${formatAmount(quote.unitsOut)}${quote.clamped ? ' (clamped at sellout)' : ''}`);
            console.log(`Fee:         ${formatAmount(quote.fee)}`);
            console.log(`Price:       ${formatAmount(quote.priceBefore)} → ${formatAmount(quote.priceAfter)}`);
        } else {
            const quote = sizer.quoteSell(sold, parseAmount(amount));
            console.log(`Reserve out: ${formatAmount(quote.reserveOut)}`);
            console.log(`Fee:         ${formatAmount(quote.fee)}`);
            console.log(`Price:       ${formatAmount(quote.priceBefore)} → ${formatAmount(quote.priceAfter)}`);
        }
        return;
    }

    if (command === 'simulate') {
        await simulate(config, args);
        return;
    }

    console.error(`Unknown command: ${command}`);
    process.exit(1);
}

main().catch((err) => {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
