import { OsintModule, type ModuleContext } from './base.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';
import { asArray, asNumber, asString, isRecord, type JsonRecord } from '../utils/guards.js';

export type Currency = 'bitcoin' | 'ethereum' | 'litecoin' | 'monero';

export const ADDRESS_PATTERNS: Record<Currency, Record<string, RegExp>> = {
    bitcoin: {
        legacy: /^[13][a-km-zA-HJ-NP-Z1-9]{25,34}$/,
        segwit: /^bc1[a-z0-9]{39,59}$/,
        segwitNested: /^3[a-km-zA-HJ-NP-Z1-9]{25,34}$/,
    },
    ethereum: {
        standard: /^0x[a-fA-F0-9]{40}$/,
    },
    litecoin: {
        legacy: /^[LM3][a-km-zA-HJ-NP-Z1-9]{26,33}$/,
        segwit: /^ltc1[a-z0-9]{39,59}$/,
    },
    monero: {
        standard: /^4[0-9AB][1-9A-HJ-NP-Za-km-z]{93}$/,
    },
};

const CURRENCIES: Currency[] = ['bitcoin', 'ethereum', 'litecoin', 'monero'];

export const BLOCKSTREAM_API = 'https://blockstream.info/api';
export const ETHERSCAN_API = 'https://api.etherscan.io/api';
const SATOSHIS_PER_BTC = 100_000_000;
const WEI_PER_ETH = 1e18;

export interface CryptoTransaction {
    txHash: string;
    /** Net effect on the tracked address, in whole coins. */
    amount: number;
    timestamp: string;
    blockHeight: number;
    confirmed: boolean;
}

export interface CryptoAddress {
    address: string;
    currency: Currency | 'unknown';
    balance: number;
    totalReceived: number;
    totalSent: number;
    transactionCount: number;
    firstSeen: string;
    lastSeen: string;
    transactions: CryptoTransaction[];
}

export type ActivityLevel = 'inactive' | 'low' | 'moderate' | 'high' | 'very_high';

export interface ActivityAnalysis {
    address: string;
    currency: CryptoAddress['currency'];
    activityLevel: ActivityLevel;
    riskIndicators: string[];
    notablePatterns: string[];
    privacyScore: number;
    recommendations: string[];
}

export function identifyCurrency(address: string): Currency | 'unknown' {
    for (const currency of CURRENCIES) {
        if (Object.values(ADDRESS_PATTERNS[currency]).some(pattern => pattern.test(address))) {
            return currency;
        }
    }
    return 'unknown';
}

export function validateAddress(address: string, currency?: string): boolean {
    if (currency === undefined) {
        return identifyCurrency(address) !== 'unknown';
    }
    const known = CURRENCIES.find(c => c === currency);
    return known !== undefined && Object.values(ADDRESS_PATTERNS[known]).some(pattern => pattern.test(address));
}

function emptyAddress(address: string, currency: CryptoAddress['currency']): CryptoAddress {
    return {
        address,
        currency,
        balance: 0,
        totalReceived: 0,
        totalSent: 0,
        transactionCount: 0,
        firstSeen: '',
        lastSeen: '',
        transactions: [],
    };
}

/** Net satoshis a Blockstream transaction moved into (positive) or out of `address`. */
function netSatoshis(tx: JsonRecord, address: string): number {
    let net = 0;
    for (const out of asArray(tx.vout)) {
        if (isRecord(out) && out.scriptpubkey_address === address) net += asNumber(out.value);
    }
    for (const input of asArray(tx.vin)) {
        if (isRecord(input) && isRecord(input.prevout) && input.prevout.scriptpubkey_address === address) {
            net -= asNumber(input.prevout.value);
        }
    }
    return net;
}

export function parseBlockstreamTransactions(body: unknown, address: string, limit = 10): CryptoTransaction[] {
    return asArray(body).slice(0, limit).filter(isRecord).map(tx => {
        const status: JsonRecord = isRecord(tx.status) ? tx.status : {};
        const blockTime = asNumber(status.block_time);
        return {
            txHash: asString(tx.txid),
            amount: netSatoshis(tx, address) / SATOSHIS_PER_BTC,
            timestamp: blockTime ? new Date(blockTime * 1000).toISOString() : '',
            blockHeight: asNumber(status.block_height),
            confirmed: status.confirmed === true,
        };
    });
}

export function analyzeActivity(addr: CryptoAddress): ActivityAnalysis {
    const analysis: ActivityAnalysis = {
        address: addr.address,
        currency: addr.currency,
        activityLevel: 'inactive',
        riskIndicators: [],
        notablePatterns: [],
        privacyScore: 0,
        recommendations: [],
    };

    const txCount = addr.transactionCount;
    if (txCount > 1000) analysis.activityLevel = 'very_high';
    else if (txCount > 100) analysis.activityLevel = 'high';
    else if (txCount > 10) analysis.activityLevel = 'moderate';
    else if (txCount > 0) analysis.activityLevel = 'low';

    if (addr.totalReceived > 0) {
        if (addr.totalSent / addr.totalReceived > 0.9) {
            analysis.notablePatterns.push('High transaction turnover');
        }
        if (addr.balance / addr.totalReceived < 0.1) {
            analysis.notablePatterns.push('Low balance retention');
        }
    }

    if (addr.balance > 100) {
        analysis.riskIndicators.push('Large balance (potential high-value target)');
    }
    if (txCount > 500) {
        analysis.riskIndicators.push('High transaction volume (potential commercial use)');
    }

    let privacyScore = 50;
    if (txCount > 50) privacyScore -= 20;
    if (analysis.riskIndicators.length > 0) privacyScore -= 15;
    analysis.privacyScore = Math.max(0, Math.min(100, privacyScore));

    if (addr.balance > 10) {
        analysis.recommendations.push('Consider using multiple addresses for better privacy');
    }
    if (txCount > 100) {
        analysis.recommendations.push('High activity may compromise privacy');
    }
    return analysis;
}

export function exportAddresses(addresses: CryptoAddress[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(
            ['Address', 'Currency', 'Balance', 'Total Received', 'Total Sent', 'TX Count'],
            addresses.map(a => [a.address, a.currency, a.balance, a.totalReceived, a.totalSent, a.transactionCount]),
        );
    }
    return JSON.stringify(addresses.map(({ transactions: _txs, ...rest }) => rest), null, 2);
}

export interface CryptoTrackerOptions extends ModuleContext {
    etherscanApiKey?: string;
}

export class CryptoTracker extends OsintModule {
    private readonly etherscanApiKey?: string;

    constructor(options: CryptoTrackerOptions) {
        super('crypto-tracker', 'Crypto Tracker', options);
        this.etherscanApiKey = options.etherscanApiKey;
    }

    async trackBitcoin(address: string): Promise<CryptoAddress> {
        const result = emptyAddress(address, 'bitcoin');
        if (!validateAddress(address, 'bitcoin')) return result;

        const info = await this.fetchJson(`${BLOCKSTREAM_API}/address/${address}`);
        if (isRecord(info) && isRecord(info.chain_stats)) {
            const funded = asNumber(info.chain_stats.funded_txo_sum);
            const spent = asNumber(info.chain_stats.spent_txo_sum);
            result.totalReceived = funded / SATOSHIS_PER_BTC;
            result.totalSent = spent / SATOSHIS_PER_BTC;
            result.balance = (funded - spent) / SATOSHIS_PER_BTC;
            result.transactionCount = asNumber(info.chain_stats.tx_count);
        }

        const txs = await this.fetchJson(`${BLOCKSTREAM_API}/address/${address}/txs`);
        result.transactions = parseBlockstreamTransactions(txs, address);
        const times = result.transactions.map(tx => tx.timestamp).filter(Boolean).sort();
        if (times.length > 0) {
            result.firstSeen = times[0];
            result.lastSeen = times[times.length - 1];
        }
        return result;
    }

    async trackEthereum(address: string): Promise<CryptoAddress> {
        const result = emptyAddress(address, 'ethereum');
        if (!validateAddress(address, 'ethereum')) return result;
        const apikey = this.etherscanApiKey;

        const balance = await this.fetchJson(ETHERSCAN_API, {
            params: { module: 'account', action: 'balance', address, tag: 'latest', apikey },
        });
        if (isRecord(balance) && balance.status === '1') {
            result.balance = asNumber(balance.result) / WEI_PER_ETH;
        }

        const count = await this.fetchJson(ETHERSCAN_API, {
            params: { module: 'proxy', action: 'eth_getTransactionCount', address, tag: 'latest', apikey },
        });
        if (isRecord(count) && typeof count.result === 'string' && /^0x[0-9a-f]+$/i.test(count.result)) {
            result.transactionCount = parseInt(count.result, 16);
        }
        return result;
    }

    /** Bitcoin and Ethereum are looked up; other currencies are identified only. */
    async track(address: string): Promise<CryptoAddress> {
        const currency = identifyCurrency(address);
        if (currency === 'bitcoin') return this.trackBitcoin(address);
        if (currency === 'ethereum') return this.trackEthereum(address);
        return emptyAddress(address, currency);
    }

    async trackMany(addresses: string[]): Promise<CryptoAddress[]> {
        const results: CryptoAddress[] = [];
        for (const address of addresses) {
            results.push(await this.track(address));
        }
        return results;
    }
}
