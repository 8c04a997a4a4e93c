import { describe, expect, it } from 'vitest';

import {
    daysSinceRegistration,
    escapeHtml,
    htmlToText,
    isCoupe,
    normalizeRegistrationDate,
} from '../utils.js';

const NOW = new Date('2024-06-10T12:00:00.000Z');

describe('normalizeRegistrationDate', () => {
    it('should pad dotted dates', () => {
        expect(normalizeRegistrationDate('2024.6.2')).toBe('2024/06/02');
    });

    it('should accept dashed dates with surrounding whitespace', () => {
        expect(normalizeRegistrationDate(' 2024-06-02 ')).toBe('2024/06/02');
    });

    it('should return null for other layouts and missing values', () => {
        expect(normalizeRegistrationDate('06/02/2024')).toBeNull();
        expect(normalizeRegistrationDate(null)).toBeNull();
        expect(normalizeRegistrationDate(undefined)).toBeNull();
    });
});

describe('daysSinceRegistration', () => {
    it('should count whole days from midnight UTC', () => {
        expect(daysSinceRegistration('2024/06/02', NOW)).toBe(8);
    });

    it('should be zero on the registration day', () => {
        expect(daysSinceRegistration('2024/06/10', NOW)).toBe(0);
    });

    it('should return null without a usable date', () => {
        expect(daysSinceRegistration(null, NOW)).toBeNull();
        expect(daysSinceRegistration('unknown', NOW)).toBeNull();
    });
});

describe('isCoupe', () => {
    it('should match korean and english markers in any label', () => {
        expect(isCoupe('GLE-클래스 W167', 'GLE450 4MATIC 쿠페')).toBe(true);
        expect(isCoupe('AMG GLE 53 COUPE')).toBe(true);
    });

    it('should reject plain SUV labels', () => {
        expect(isCoupe('GLE-클래스 W167', 'GLE450 4MATIC')).toBe(false);
    });
});

describe('htmlToText', () => {
    it('should drop scripts and styles and separate adjacent elements', () => {
        const html = '<html><head><style>p { color: red }</style></head><body><p>A</p><p>B</p><script>x()</script></body></html>';

        expect(htmlToText(html)).toBe('A B');
    });

    it('should keep nested inline text apart', () => {
        expect(htmlToText('<div><span>조회수</span><b>12</b></div>')).toBe('조회수 12');
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
    });
});
