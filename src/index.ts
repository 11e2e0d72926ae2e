import dotenv from 'dotenv';
import {createApp} from "./app";
import {getI18nConfig} from "./config/i18n";

dotenv.config();

const port = Number(process.env.PORT) || 3000;
const i18n = getI18nConfig();

const app = createApp({i18n});

app.listen(port, () => {
    console.log(`Server listening on http://localhost:${port}`);
    console.log(`Languages: ${i18n.supportedLanguages.join(', ')} (default ${i18n.defaultLanguage})`);
});

export default app;
