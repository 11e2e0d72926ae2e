import {Request} from "express";
import {
    accepts,
    getAll,
    getBestMatch,
    getLanguages,
    getPrimary,
    getPrimaryLanguage,
    getPrimaryRegion,
    getQuality,
    isRtl,
    LocaleTag,
    parse,
    PreferenceList,
} from "../utils/acceptLanguage";

type HeaderSource = Pick<Request, 'headers'>;

/**
 * Header-sourced queries bound to one request's Accept-Language value.
 * Each call re-parses the header.
 */
export type LanguagePreferences = {
    header: string | null;
    parse: () => PreferenceList;
    getPrimary: () => LocaleTag | null;
    getPrimaryLanguage: () => string | null;
    getPrimaryRegion: () => string | null;
    getAll: () => LocaleTag[];
    getLanguages: () => string[];
    accepts: (language: string, exact?: boolean) => boolean;
    getQuality: (language: string) => number | null;
    getBestMatch: (available: readonly string[], defaultLanguage?: string | null) => string | null;
    isRtl: () => boolean;
};

export const getAcceptLanguageHeader = (req: HeaderSource): string | null => {
    const header = req.headers['accept-language'];
    if (!header || !header.trim()) {
        return null;
    }
    return header;
};

export const languagePreferencesFor = (req: HeaderSource): LanguagePreferences => {
    const header = getAcceptLanguageHeader(req);
    return {
        header,
        parse: () => parse(header),
        getPrimary: () => getPrimary(header),
        getPrimaryLanguage: () => getPrimaryLanguage(header),
        getPrimaryRegion: () => getPrimaryRegion(header),
        getAll: () => getAll(header),
        getLanguages: () => getLanguages(header),
        accepts: (language, exact = false) => accepts(header, language, exact),
        getQuality: (language) => getQuality(header, language),
        getBestMatch: (available, defaultLanguage = null) => getBestMatch(header, available, defaultLanguage),
        isRtl: () => isRtl(header),
    };
};

export const getAcceptLanguage = (req: HeaderSource) => getPrimary(getAcceptLanguageHeader(req));

export const getPreferredLanguage = (
    req: HeaderSource,
    available: readonly string[],
    defaultLanguage: string | null = null,
) => getBestMatch(getAcceptLanguageHeader(req), available, defaultLanguage);

export const acceptsLanguage = (req: HeaderSource, language: string, exact = false) =>
    accepts(getAcceptLanguageHeader(req), language, exact);

export const isRtlLanguage = (req: HeaderSource) => isRtl(getAcceptLanguageHeader(req));
