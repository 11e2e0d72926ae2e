export type LocaleTag = string;

export type PreferenceEntry = {
    locale: LocaleTag;
    quality: number;
};

export type PreferenceList = ReadonlyArray<Readonly<PreferenceEntry>>;

export type AcceptLanguageHeader = string | null | undefined;

export const RTL_LANGUAGES: ReadonlySet<string> = new Set([
    'ar', // Arabic
    'he', // Hebrew
    'fa', // Persian
    'ur', // Urdu
    'yi', // Yiddish
    'ps', // Pashto
    'sd', // Sindhi
    'ug', // Uyghur
    'ku', // Kurdish (Sorani)
    'dv', // Divehi
]);

const DEFAULT_QUALITY = 1.0;
const QUALITY_PATTERN = /q=(\d+(?:\.\d*)?|\.\d+)/;

const parseQuality = (params: string): number => {
    const match = QUALITY_PATTERN.exec(params);
    if (!match) {
        return DEFAULT_QUALITY;
    }
    const value = Number.parseFloat(match[1]);
    if (!Number.isFinite(value)) {
        return DEFAULT_QUALITY;
    }
    return Math.min(1, Math.max(0, value));
};

/**
 * Normalize a language code: lowercase language, uppercase region
 * ('EN-us' => 'en-US', 'de_at' => 'de-AT').
 *
 * Everything after the first hyphen is treated as the region, so
 * 'zh-hans-cn' becomes 'zh-HANS-CN'.
 */
export function normalize(code: string): LocaleTag {
    const trimmed = code.trim();
    if (!trimmed) {
        return '';
    }

    const hyphenated = trimmed.replace(/_/g, '-');
    const separator = hyphenated.indexOf('-');
    if (separator === -1) {
        return hyphenated.toLowerCase();
    }

    const language = hyphenated.slice(0, separator);
    const region = hyphenated.slice(separator + 1);
    return `${language.toLowerCase()}-${region.toUpperCase()}`;
}

export function extractLanguage(locale: string): string {
    const hyphenated = locale.replace(/_/g, '-');
    return hyphenated.split('-')[0].toLowerCase();
}

/**
 * Only the second hyphen-separated segment is taken as the region:
 * 'zh-Hans-CN' yields 'HANS'.
 */
export function extractRegion(locale: string): string | null {
    const hyphenated = locale.replace(/_/g, '-');
    if (!hyphenated.includes('-')) {
        return null;
    }
    const region = hyphenated.split('-')[1];
    return region === undefined ? null : region.toUpperCase();
}

/**
 * Parse an Accept-Language header into locales sorted by quality, highest first.
 *
 * A locale listed twice keeps the quality of its last occurrence but the
 * position of its first one; equal qualities keep header order.
 */
export function parse(header: AcceptLanguageHeader): PreferenceList {
    if (!header) {
        return [];
    }

    const qualities = new Map<LocaleTag, number>();

    for (const raw of header.split(',')) {
        const part = raw.trim();
        if (!part) {
            continue;
        }

        const separator = part.indexOf(';');
        const tag = separator === -1 ? part : part.slice(0, separator);
        const quality = separator === -1 ? DEFAULT_QUALITY : parseQuality(part.slice(separator + 1));

        const locale = normalize(tag);
        if (locale) {
            qualities.set(locale, quality);
        }
    }

    return Array.from(qualities, ([locale, quality]) => ({locale, quality}))
        .sort((a, b) => b.quality - a.quality);
}

export function getAll(header: AcceptLanguageHeader): LocaleTag[] {
    return parse(header).map((entry) => entry.locale);
}

export function getPrimary(header: AcceptLanguageHeader): LocaleTag | null {
    return parse(header)[0]?.locale ?? null;
}

export function getPrimaryLanguage(header: AcceptLanguageHeader): string | null {
    const primary = getPrimary(header);
    return primary ? extractLanguage(primary) : null;
}

export function getPrimaryRegion(header: AcceptLanguageHeader): string | null {
    const primary = getPrimary(header);
    return primary ? extractRegion(primary) : null;
}

/** Base languages without regions, in preference order ('en-US,en-GB,de' => ['en', 'de']). */
export function getLanguages(header: AcceptLanguageHeader): string[] {
    const languages: string[] = [];
    for (const locale of getAll(header)) {
        const language = extractLanguage(locale);
        if (language && !languages.includes(language)) {
            languages.push(language);
        }
    }
    return languages;
}

/**
 * Whether the header accepts `language`. Unless `exact` is set, any
 * accepted locale sharing the base language counts ('de' is accepted by 'de-DE').
 */
export function accepts(header: AcceptLanguageHeader, language: string, exact = false): boolean {
    const candidate = normalize(language);
    if (!candidate) {
        return false;
    }

    const accepted = getAll(header);
    if (accepted.includes(candidate)) {
        return true;
    }
    if (exact) {
        return false;
    }

    const base = extractLanguage(candidate);
    return accepted.some((locale) => extractLanguage(locale) === base);
}

/** Exact lookup: 'de' is not found in a header listing only 'de-DE'. */
export function getQuality(header: AcceptLanguageHeader, language: string): number | null {
    const candidate = normalize(language);
    if (!candidate) {
        return null;
    }
    return parse(header).find((entry) => entry.locale === candidate)?.quality ?? null;
}

/**
 * Pick the available language that best satisfies the header.
 *
 * Every preference is first tried for an exact match; only then are base
 * languages compared, so an exact match of low quality wins over a
 * base-language match of a better-ranked preference. The returned value is
 * spelled as given in `available`.
 */
export function getBestMatch(
    header: AcceptLanguageHeader,
    available: readonly string[],
    defaultLanguage: string | null = null,
): string | null {
    const accepted = getAll(header);
    if (!accepted.length || !available.length) {
        return defaultLanguage;
    }

    const candidates = new Map<LocaleTag, string>();
    for (const language of available) {
        const normalized = normalize(language);
        if (normalized) {
            candidates.set(normalized, language);
        }
    }

    for (const locale of accepted) {
        const original = candidates.get(locale);
        if (original !== undefined) {
            return original;
        }
    }

    for (const locale of accepted) {
        const base = extractLanguage(locale);
        for (const [normalized, original] of candidates) {
            if (extractLanguage(normalized) === base) {
                return original;
            }
        }
    }

    return defaultLanguage;
}

export function isRtlLocale(locale: string): boolean {
    return RTL_LANGUAGES.has(extractLanguage(locale));
}

export function isRtl(header: AcceptLanguageHeader): boolean {
    const primary = getPrimaryLanguage(header);
    return primary ? RTL_LANGUAGES.has(primary) : false;
}
