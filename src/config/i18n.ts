export type I18nConfig = {
    supportedLanguages: string[];
    defaultLanguage: string;
};

const FALLBACK_LANGUAGES = ['en', 'fr'];
const FALLBACK_DEFAULT = 'en';

const splitList = (value: string) =>
    value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);

export const readI18nConfig = (env: NodeJS.ProcessEnv): I18nConfig => {
    const supportedLanguages = env.SUPPORTED_LANGUAGES !== undefined
        ? splitList(env.SUPPORTED_LANGUAGES)
        : FALLBACK_LANGUAGES;
    const defaultLanguage = env.DEFAULT_LANGUAGE?.trim()
        || supportedLanguages[0]
        || FALLBACK_DEFAULT;
    return {supportedLanguages, defaultLanguage};
};

export const getI18nConfig = () => readI18nConfig(process.env);
