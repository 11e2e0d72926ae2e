import express from 'express';
import morgan from "morgan";
import cors from "cors";
import router from "./routes/index.routes";
import {getI18nConfig, I18nConfig} from "./config/i18n";
import {negotiateLanguage} from "./middlewares/i18n";
import {API_ERROR} from "./constants/errorCodes";
import {sendResponse} from "./utils/helpers";

type AppOptions = {
    i18n?: I18nConfig;
    logRequests?: boolean;
};

export const createApp = ({i18n = getI18nConfig(), logRequests = true}: AppOptions = {}) => {
    const app = express();

    if (logRequests) {
        app.use((req, res, next) => {
            console.log(`[${new Date().toISOString()}] ${req.method} ${req.originalUrl}`);
            next();
        });
        app.use(morgan("dev"));
    }

    app.use(cors());

    app.use(negotiateLanguage(i18n));

    app.use("/api", router);

    app.get("/", (_, res) => res.json({ ok: true }));

    app.use((_req, res) => sendResponse(res, 404, {code: API_ERROR.NOT_FOUND}));

    return app;
};
