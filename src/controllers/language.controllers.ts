import {Request, Response} from 'express';
import {API_ERROR} from '../constants/errorCodes';
import {languagePreferencesFor} from '../i18n/requestLanguage';
import {detectLanguage} from '../middlewares/i18n';
import {extractLanguage, extractRegion, normalize} from '../utils/acceptLanguage';
import {getSingleParam, parseBoolean, parseList, sendResponse} from '../utils/helpers';

export const getLanguagePreferences = (req: Request, res: Response) => {
    try {
        const preferences = languagePreferencesFor(req);
        return sendResponse(res, 200, {
            data: {
                header: preferences.header,
                negotiated: detectLanguage(req),
                rtl: preferences.isRtl(),
                preferences: preferences.parse(),
                primary: preferences.getPrimary(),
                primaryLanguage: preferences.getPrimaryLanguage(),
                primaryRegion: preferences.getPrimaryRegion(),
                languages: preferences.getLanguages(),
            },
        });
    } catch (err) {
        console.error('getLanguagePreferences error:', err);
        return sendResponse(res, 500, {code: API_ERROR.INTERNAL_ERROR});
    }
};

export const matchLanguage = (req: Request, res: Response) => {
    try {
        const available = parseList(req.query.available);
        if (!available.length) {
            return sendResponse(res, 400, {code: API_ERROR.INVALID_REQUEST});
        }
        const fallback = getSingleParam(req.query.default)?.trim() || null;
        const match = languagePreferencesFor(req).getBestMatch(available, fallback);
        return sendResponse(res, 200, {data: {match}});
    } catch (err) {
        console.error('matchLanguage error:', err);
        return sendResponse(res, 500, {code: API_ERROR.INTERNAL_ERROR});
    }
};

export const acceptsLanguageHandler = (req: Request, res: Response) => {
    try {
        const language = getSingleParam(req.query.lang) ?? '';
        const exact = parseBoolean(req.query.exact, false);
        const preferences = languagePreferencesFor(req);
        return sendResponse(res, 200, {
            data: {
                language,
                normalized: normalize(language),
                accepted: preferences.accepts(language, exact),
                quality: preferences.getQuality(language),
            },
        });
    } catch (err) {
        console.error('acceptsLanguageHandler error:', err);
        return sendResponse(res, 500, {code: API_ERROR.INTERNAL_ERROR});
    }
};

export const normalizeLanguage = (req: Request, res: Response) => {
    try {
        const code = getSingleParam(req.query.code) ?? '';
        const normalized = normalize(code);
        return sendResponse(res, 200, {
            data: {
                normalized,
                language: normalized ? extractLanguage(normalized) : null,
                region: extractRegion(normalized),
            },
        });
    } catch (err) {
        console.error('normalizeLanguage error:', err);
        return sendResponse(res, 500, {code: API_ERROR.INTERNAL_ERROR});
    }
};
