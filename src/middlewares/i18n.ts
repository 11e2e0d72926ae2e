import {NextFunction, Request, Response} from "express";
import {getI18nConfig, I18nConfig} from "../config/i18n";
import {getAcceptLanguageHeader} from "../i18n/requestLanguage";
import {getBestMatch, isRtlLocale, parse, PreferenceList} from "../utils/acceptLanguage";

export type NegotiatedLanguage = {
    code: string;
    rtl: boolean;
    preferences: PreferenceList;
};

declare global {
    namespace Express {
        interface Request {
            language?: NegotiatedLanguage;
        }
    }
}

const resolveLanguage = (req: Request, config: I18nConfig): NegotiatedLanguage => {
    const header = getAcceptLanguageHeader(req);
    const code = getBestMatch(header, config.supportedLanguages, config.defaultLanguage) ?? config.defaultLanguage;
    return {code, rtl: isRtlLocale(code), preferences: parse(header)};
};

export const negotiateLanguage = (config: I18nConfig = getI18nConfig()) =>
    (req: Request, res: Response, next: NextFunction) => {
        const language = resolveLanguage(req, config);
        req.language = language;
        res.setHeader('Content-Language', language.code);
        res.vary('Accept-Language');
        next();
    };

export function detectLanguage(req: Request, config: I18nConfig = getI18nConfig()): string {
    return req.language?.code ?? resolveLanguage(req, config).code;
}
