import assert from 'node:assert/strict';
import {describe, test} from 'node:test';
import {
    accepts,
    extractLanguage,
    extractRegion,
    getAll,
    getBestMatch,
    getLanguages,
    getPrimary,
    getPrimaryLanguage,
    getPrimaryRegion,
    getQuality,
    isRtl,
    isRtlLocale,
    normalize,
    parse,
} from '../src/utils/acceptLanguage';

const HEADER = 'en-US,en;q=0.9,de;q=0.8';

describe('normalize', () => {
    test('lowercases the language and uppercases the region', () => {
        assert.equal(normalize('EN-us'), 'en-US');
        assert.equal(normalize('DE_at'), 'de-AT');
        assert.equal(normalize('  FR '), 'fr');
    });

    test('returns an empty string for blank input', () => {
        assert.equal(normalize(''), '');
        assert.equal(normalize('   '), '');
    });

    test('keeps everything after the first hyphen as one region', () => {
        assert.equal(normalize('zh-hans_cn'), 'zh-HANS-CN');
    });

    test('is idempotent', () => {
        for (const code of ['EN-us', 'de_AT', 'zh-Hans-CN', 'fr', '', ' pt_br ', '-x', 'en-']) {
            assert.equal(normalize(normalize(code)), normalize(code));
        }
    });
});

describe('extractLanguage / extractRegion', () => {
    test('splits a locale into language and region', () => {
        assert.equal(extractLanguage('en-US'), 'en');
        assert.equal(extractLanguage('PT_br'), 'pt');
        assert.equal(extractLanguage('DE'), 'de');
        assert.equal(extractRegion('en-US'), 'US');
        assert.equal(extractRegion('pt_br'), 'BR');
        assert.equal(extractRegion('de'), null);
    });

    test('takes only the second segment as region', () => {
        assert.equal(extractRegion('zh-Hans-CN'), 'HANS');
    });
});

describe('parse', () => {
    test('orders locales by quality', () => {
        assert.deepEqual(parse(HEADER), [
            {locale: 'en-US', quality: 1},
            {locale: 'en', quality: 0.9},
            {locale: 'de', quality: 0.8},
        ]);
    });

    test('sorts entries listed out of order', () => {
        assert.deepEqual(getAll('fr;q=0.3, de;q=0.7 ,es'), ['es', 'de', 'fr']);
    });

    test('returns an empty list for a missing or blank header', () => {
        assert.deepEqual(parse(undefined), []);
        assert.deepEqual(parse(null), []);
        assert.deepEqual(parse(''), []);
        assert.deepEqual(parse(' , ,'), []);
    });

    test('defaults malformed quality values to 1', () => {
        assert.deepEqual(parse('fr;q=abc'), [{locale: 'fr', quality: 1}]);
        assert.deepEqual(parse('fr;level=1'), [{locale: 'fr', quality: 1}]);
        assert.deepEqual(parse('fr;'), [{locale: 'fr', quality: 1}]);
    });

    test('reads the quality wherever it sits in the parameters', () => {
        assert.deepEqual(parse('fr; charset=x; q=0.4'), [{locale: 'fr', quality: 0.4}]);
        assert.deepEqual(parse('fr;q=.5'), [{locale: 'fr', quality: 0.5}]);
        assert.deepEqual(parse('fr;q=0.5.1'), [{locale: 'fr', quality: 0.5}]);
    });

    test('clamps qualities into [0, 1]', () => {
        assert.deepEqual(parse('fr;q=2,de;q=0'), [
            {locale: 'fr', quality: 1},
            {locale: 'de', quality: 0},
        ]);
    });

    test('normalizes tags and lets the last duplicate set the quality', () => {
        assert.deepEqual(parse('en_us;q=0.3, de;q=0.5, EN-US;q=0.8'), [
            {locale: 'en-US', quality: 0.8},
            {locale: 'de', quality: 0.5},
        ]);
    });

    test('keeps header order for equal qualities', () => {
        assert.deepEqual(getAll('fr;q=0.5,de;q=0.5,it,es;q=0.5'), ['it', 'fr', 'de', 'es']);
        assert.deepEqual(getAll('fr;q=0.5,de;q=0.5,fr;q=0.5'), ['fr', 'de']);
    });

    test('drops entries whose tag is empty', () => {
        assert.deepEqual(getAll(';q=0.5,de'), ['de']);
    });

    test('yields unique normalized tags sorted by descending quality', () => {
        const list = parse('en-gb;q=0.2,EN_gb;q=0.6,*;q=0.1,ar-eg,de;q=0.6,ar;q=0.95');
        assert.deepEqual(list.map((entry) => entry.locale), ['ar-EG', 'ar', 'en-GB', 'de', '*']);
        assert.equal(new Set(list.map((entry) => entry.locale)).size, list.length);
        for (let i = 1; i < list.length; i++) {
            assert.ok(list[i - 1].quality >= list[i].quality);
        }
        for (const entry of list) {
            assert.ok(entry.quality >= 0 && entry.quality <= 1);
            assert.equal(normalize(entry.locale), entry.locale);
        }
    });
});

describe('header queries', () => {
    test('derive the primary preference', () => {
        assert.equal(getPrimary(HEADER), 'en-US');
        assert.equal(getPrimaryLanguage(HEADER), 'en');
        assert.equal(getPrimaryRegion(HEADER), 'US');
        assert.equal(getPrimaryRegion('de;q=0.9'), null);
    });

    test('return null without a header', () => {
        assert.equal(getPrimary(null), null);
        assert.equal(getPrimaryLanguage(''), null);
        assert.equal(getPrimaryRegion(undefined), null);
    });

    test('list locales and unique base languages', () => {
        assert.deepEqual(getAll(HEADER), ['en-US', 'en', 'de']);
        assert.deepEqual(getLanguages(HEADER), ['en', 'de']);
        assert.deepEqual(getLanguages('pt-BR,de-CH;q=0.8,pt-PT;q=0.7,de;q=0.5'), ['pt', 'de']);
        assert.deepEqual(getLanguages(null), []);
    });
});

describe('accepts', () => {
    test('matches on the base language unless exact', () => {
        assert.equal(accepts('de-DE', 'de'), true);
        assert.equal(accepts('de-DE', 'de', true), false);
        assert.equal(accepts('de-DE', 'DE_de', true), true);
        assert.equal(accepts('de', 'de-AT'), true);
    });

    test('rejects missing languages and blank candidates', () => {
        assert.equal(accepts(HEADER, 'fr'), false);
        assert.equal(accepts(HEADER, ''), false);
        assert.equal(accepts(HEADER, '  '), false);
        assert.equal(accepts(null, 'en'), false);
    });
});

describe('getQuality', () => {
    test('looks up exact locales only', () => {
        assert.equal(getQuality(HEADER, 'en'), 0.9);
        assert.equal(getQuality(HEADER, 'EN_us'), 1);
        assert.equal(getQuality(HEADER, 'de-DE'), null);
        assert.equal(getQuality('de-DE', 'de'), null);
        assert.equal(getQuality(HEADER, ''), null);
    });
});

describe('getBestMatch', () => {
    test('prefers exact matches in preference order', () => {
        assert.equal(getBestMatch(HEADER, ['de', 'en'], 'fr'), 'en');
        assert.equal(getBestMatch(HEADER, ['de', 'fr'], 'en'), 'de');
    });

    test('falls back to the base language', () => {
        assert.equal(getBestMatch('fr-CA;q=0.5', ['fr'], 'en'), 'fr');
        assert.equal(getBestMatch('en-AU', ['de', 'en-GB', 'en-US']), 'en-GB');
    });

    test('returns exact matches ahead of better-ranked base-language matches', () => {
        assert.equal(getBestMatch('fr;q=0.2,de;q=1.0', ['fr', 'xx']), 'fr');
        assert.equal(getBestMatch('de-CH,fr;q=0.2', ['de-DE', 'fr']), 'fr');
    });

    test('returns the caller spelling of the match', () => {
        assert.equal(getBestMatch('pt-BR', ['pt_br']), 'pt_br');
        assert.equal(getBestMatch('pt-BR', ['pt-br', 'PT_BR']), 'PT_BR');
    });

    test('ignores blank candidates', () => {
        assert.equal(getBestMatch('-US', ['', ' '], 'en'), 'en');
    });

    test('returns the default when nothing matches', () => {
        assert.equal(getBestMatch(HEADER, ['ja'], 'fr'), 'fr');
        assert.equal(getBestMatch(HEADER, ['ja']), null);
        assert.equal(getBestMatch(HEADER, [], 'fr'), 'fr');
        assert.equal(getBestMatch(null, ['en'], 'fr'), 'fr');
    });
});

describe('isRtl', () => {
    test('follows the primary language', () => {
        assert.equal(isRtl('ar-EG,en;q=0.5'), true);
        assert.equal(isRtl('he'), true);
        assert.equal(isRtl('fa-IR'), true);
        assert.equal(isRtl('en-US,ar;q=0.9'), false);
        assert.equal(isRtl(null), false);
    });

    test('classifies single locales', () => {
        assert.equal(isRtlLocale('ur_PK'), true);
        assert.equal(isRtlLocale('DV'), true);
        assert.equal(isRtlLocale('en'), false);
    });
});
