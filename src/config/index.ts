import fs from 'fs';
import { isAddress, type Address } from 'viem';
import { DEFAULT_BASE_PRICE, DEFAULT_CREATION_FEE } from '../curve/constants.js';
import { parseAmount } from '../utils/units.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LaunchpadConfig {
    basePrice: bigint;
    creationFee: bigint;
    owner: Address;
    treasury: Address;
    factory: Address;
    logLevel: LogLevel;
}

/**
 * Shape of the JSON config file and of the environment overrides: amounts
 * are decimal strings in whole reserve units ("0.0001").
 */
export interface RawLaunchpadConfig {
    basePrice?: string;
    creationFee?: string;
    owner?: string;
    treasury?: string;
    factory?: string;
    logLevel?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CONFIG: LaunchpadConfig = {
    basePrice: DEFAULT_BASE_PRICE,
    creationFee: DEFAULT_CREATION_FEE,
    owner: '0x00000000000000000000000000000000000000a1',
    treasury: '0x00000000000000000000000000000000000000f1',
    factory: '0x00000000000000000000000000000000000000fa',
    logLevel: 'info',
};

function fromEnv(env: NodeJS.ProcessEnv): RawLaunchpadConfig {
    return {
        basePrice: env.LAUNCHPAD_BASE_PRICE,
        creationFee: env.LAUNCHPAD_CREATION_FEE,
        owner: env.LAUNCHPAD_OWNER,
        treasury: env.LAUNCHPAD_TREASURY,
        factory: env.LAUNCHPAD_FACTORY,
        logLevel: env.LOG_LEVEL,
    };
}

function readFile(configPath: string): RawLaunchpadConfig {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    const result: RawLaunchpadConfig = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value === undefined || value === null) continue;
        if (typeof value !== 'string') {
            throw new Error(`Config key "${key}" must be a string`);
        }
        switch (key) {
            case 'basePrice':
            case 'creationFee':
            case 'owner':
            case 'treasury':
            case 'factory':
            case 'logLevel':
                result[key] = value;
                break;
            default:
                throw new Error(`Unknown config key "${key}"`);
        }
    }
    return result;
}

function toAddress(key: string, value: string): Address {
    if (!isAddress(value)) {
        throw new Error(`Config "${key}" is not a valid address: ${value}`);
    }
    return value;
}

function toLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new Error(`Config "logLevel" must be one of ${LOG_LEVELS.join(', ')}, got ${value}`);
    }
    return level;
}

/**
 * Apply raw overrides on top of a resolved config. Later sources win.
 */
export function resolveConfig(base: LaunchpadConfig, ...sources: RawLaunchpadConfig[]): LaunchpadConfig {
    const config = { ...base };
    for (const source of sources) {
        if (source.basePrice) config.basePrice = parseAmount(source.basePrice);
        if (source.creationFee) config.creationFee = parseAmount(source.creationFee);
        if (source.owner) config.owner = toAddress('owner', source.owner);
        if (source.treasury) config.treasury = toAddress('treasury', source.treasury);
        if (source.factory) config.factory = toAddress('factory', source.factory);
        if (source.logLevel) config.logLevel = toLogLevel(source.logLevel);
    }
    if (config.basePrice <= 0n) {
        throw new Error('Config "basePrice" must be greater than zero');
    }
    return config;
}

/**
 * Defaults, then environment variables, then the JSON file (if given).
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): LaunchpadConfig {
    const fileConfig = configPath ? readFile(configPath) : {};
    return resolveConfig(DEFAULT_CONFIG, fromEnv(env), fileConfig);
}
