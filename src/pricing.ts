import { log } from 'apify';

import { LEASE_MARKERS } from './constants.js';
import { ParseError } from './errors.js';
import type { LeaseTerms } from './types.js';

const LOG_PREFIX = '[pricing]';

// Amounts are in 만원 (10,000 won) throughout.
const WON_PER_UNIT = 10_000;
const UNITS_PER_EOK = 10_000;
const PROXIMITY_WINDOW = 40;
const PRECEDING_WINDOW = 8;

const NUMBER = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)`;
const AMOUNT = String.raw`${NUMBER}\s*만\s*원`;
const MONTHS = String.raw`(\d{1,3})\s*개월`;

// Each form must cover the whole string; anything else is an unrecognized format.
const EOK_PRICE = new RegExp(String.raw`^(\d+(?:\.\d+)?)\s*억(?:\s*${NUMBER}\s*만)?\s*원?$`);
const MAN_PRICE = new RegExp(String.raw`^${NUMBER}\s*만\s*원?$`);
const WON_PRICE = new RegExp(String.raw`^${NUMBER}\s*원$`);
const PLAIN_PRICE = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;

const toNumber = (digits: string): number => Number(digits.replace(/,/g, ''));

/**
 * Converts a marketplace price into canonical units.
 * "6,500만원" and "6500" are already canonical, "65,000,000원" is divided by 10,000
 * and "1억 2,000만원" becomes 12000.
 */
export const parsePrice = (value: number | string): number => {
    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value < 0) throw new ParseError(value);
        return value;
    }

    const text = value.trim();
    const eok = text.match(EOK_PRICE);
    if (eok) return toNumber(eok[1]) * UNITS_PER_EOK + (eok[2] ? toNumber(eok[2]) : 0);

    const man = text.match(MAN_PRICE);
    if (man) return toNumber(man[1]);

    const won = text.match(WON_PRICE);
    if (won) return toNumber(won[1]) / WON_PER_UNIT;

    if (PLAIN_PRICE.test(text)) return toNumber(text);

    throw new ParseError(value);
};

export const computeLeaseTrueCost = (
    deposit: number,
    monthlyPayment: number,
    termMonths: number,
    finalPayment = 0,
): number => deposit + monthlyPayment * termMonths + finalPayment;

/** Lease total when monthly payment and term are known, otherwise the listed price. Never below listed. */
export const resolveTrueCost = (listedPrice: number, lease: LeaseTerms | null): number => {
    if (!lease || lease.monthlyPayment === null || lease.termMonths === null) return listedPrice;

    const trueCost = computeLeaseTrueCost(
        lease.deposit ?? 0,
        lease.monthlyPayment,
        lease.termMonths,
        lease.finalPayment ?? 0,
    );
    if (trueCost < listedPrice) {
        log.warning(`${LOG_PREFIX} Lease total below listed price, keeping listed price`, { listedPrice, trueCost });
        return listedPrice;
    }
    return trueCost;
};

const priceFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 1 });

export const formatPrice = (amount: number): string => `${priceFormat.format(amount)}만원`;

interface FieldRule {
    labelled: RegExp[];
    keywords: string[];
    /** Amounts shortly after one of these words belong to another field. */
    notAfter?: RegExp;
    capture: RegExp;
    min: number;
    max: number;
}

const labelled = (label: string, value = AMOUNT): RegExp =>
    new RegExp(String.raw`${label}\s*(?:\([^)]*\))?\s*:?\s*${value}`, 'g');

// Ordered strategies per field: labelled patterns first, first plausible match wins.
const FIELD_RULES: Record<keyof LeaseTerms, FieldRule> = {
    deposit: {
        labelled: [
            labelled(String.raw`(?<!만기\s?)인수금`),
            labelled(String.raw`(?:리스\s*)?보증금`),
            labelled('선수금'),
        ],
        keywords: ['인수금', '보증금', '선수금'],
        notAfter: /만기/,
        capture: new RegExp(AMOUNT),
        min: 50,
        max: 50_000,
    },
    monthlyPayment: {
        labelled: [
            labelled(String.raw`월\s*(?:리스료|렌트료|납입금|납입료)`),
            labelled(String.raw`(?:리스료|렌트료)\s*(?:\(\s*월\s*\))?`),
        ],
        keywords: ['월리스료', '월렌트료', '월납입금', '월 납입금', '리스료', '렌트료'],
        capture: new RegExp(AMOUNT),
        min: 10,
        max: 1000,
    },
    termMonths: {
        labelled: [
            new RegExp(String.raw`만\s*원\s*[×xX*]?\s*${MONTHS}`, 'g'),
            labelled(String.raw`(?:리스|렌트|계약|이용)\s*기간`, MONTHS),
        ],
        keywords: ['리스기간', '렌트기간', '계약기간', '기간'],
        capture: new RegExp(MONTHS),
        min: 6,
        max: 84,
    },
    // Only explicit buy-out or residual labels. The end-of-lease section also lists the
    // deposit refunded on return, which is money back rather than a cost.
    finalPayment: {
        labelled: [labelled(String.raw`(?:잔존가치|잔가|만기\s*인수금)`)],
        keywords: ['잔존가치', '잔가'],
        notAfter: /반납|환급/,
        capture: new RegExp(AMOUNT),
        min: 50,
        max: 50_000,
    },
    vehiclePrice: {
        labelled: [labelled(String.raw`차량\s*가격`), labelled(String.raw`(?:차량\s*가액|차량가)`)],
        keywords: ['차량가격', '차량 가격', '차량가'],
        capture: new RegExp(AMOUNT),
        min: 100,
        max: 100_000,
    },
};

const plausible = (rule: FieldRule, value: number): boolean =>
    Number.isFinite(value) && value >= rule.min && value <= rule.max;

const follows = (text: string, index: number, rule: FieldRule): boolean =>
    rule.notAfter !== undefined && rule.notAfter.test(text.slice(Math.max(0, index - PRECEDING_WINDOW), index));

const findLabelled = (text: string, rule: FieldRule): number | null => {
    for (const pattern of rule.labelled) {
        for (const match of text.matchAll(pattern)) {
            if (follows(text, match.index ?? 0, rule)) continue;
            const value = toNumber(match[1]);
            if (plausible(rule, value)) return value;
        }
    }
    return null;
};

const findNearKeyword = (text: string, rule: FieldRule): number | null => {
    for (const keyword of rule.keywords) {
        let index = text.indexOf(keyword);
        while (index !== -1) {
            const start = index + keyword.length;
            if (follows(text, index, rule)) {
                index = text.indexOf(keyword, start);
                continue;
            }
            const match = text.slice(start, start + PROXIMITY_WINDOW).match(rule.capture);
            if (match) {
                const value = toNumber(match[1]);
                if (plausible(rule, value)) return value;
            }
            index = text.indexOf(keyword, start);
        }
    }
    return null;
};

/**
 * Pulls lease components out of rendered page text. Returns null when the text has no
 * lease vocabulary at all; otherwise every field that could not be resolved stays null.
 * Out-of-range magnitudes are skipped, since the page sometimes shows values pre-divided by 100.
 */
export const extractLeaseTerms = (pageText: string): LeaseTerms | null => {
    const text = pageText.replace(/\s+/g, ' ');
    if (!LEASE_MARKERS.some((marker) => text.includes(marker))) return null;

    const resolve = (rule: FieldRule): number | null => findLabelled(text, rule) ?? findNearKeyword(text, rule);

    return {
        deposit: resolve(FIELD_RULES.deposit),
        monthlyPayment: resolve(FIELD_RULES.monthlyPayment),
        termMonths: resolve(FIELD_RULES.termMonths),
        finalPayment: resolve(FIELD_RULES.finalPayment),
        vehiclePrice: resolve(FIELD_RULES.vehiclePrice),
    };
};
