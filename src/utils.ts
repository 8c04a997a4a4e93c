import * as cheerio from 'cheerio';

import { COUPE_MARKERS, DAY_MS } from './constants.js';

const REGISTRATION_DATE = /^(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})$/;

/** Normalises "2024-06-02", "2024.6.2" or "2024/06/02" to "2024/06/02"; null when not a date. */
export const normalizeRegistrationDate = (value: string | null | undefined): string | null => {
    const match = value?.trim().match(REGISTRATION_DATE);
    if (!match) return null;
    const [, year, month, day] = match;
    return `${year}/${month.padStart(2, '0')}/${day.padStart(2, '0')}`;
};

/** Whole days between a YYYY/MM/DD date (UTC midnight) and `now`. */
export const daysSinceRegistration = (registrationDate: string | null, now: Date): number | null => {
    const normalized = normalizeRegistrationDate(registrationDate);
    if (!normalized) return null;
    const [year, month, day] = normalized.split('/').map(Number);
    const registeredAt = Date.UTC(year, month - 1, day);
    return Math.floor((now.getTime() - registeredAt) / DAY_MS);
};

export const isCoupe = (...labels: string[]): boolean =>
    labels.some((label) => COUPE_MARKERS.some((marker) => label.toLowerCase().includes(marker)));

/** Flattens markup into single-spaced text, keeping a gap between adjacent elements. */
export const htmlToText = (html: string): string => {
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();
    $('body *').each((_, element) => {
        $(element).append(' ');
    });
    return $('body').text().replace(/\s+/g, ' ').trim();
};

export const escapeHtml = (text: string): string =>
    text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
