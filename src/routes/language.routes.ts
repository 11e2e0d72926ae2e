import {Router} from 'express';
import checkValidationResult from '../utils/common';
import {validateAccepts, validateMatch, validateNormalize} from '../middlewares/language';
import * as languageControllers from '../controllers/language.controllers';

const router = Router();

router.get('/', languageControllers.getLanguagePreferences);

router.get('/match',
    validateMatch,
    checkValidationResult,
    languageControllers.matchLanguage
);

router.get('/accepts',
    validateAccepts,
    checkValidationResult,
    languageControllers.acceptsLanguageHandler
);

router.get('/normalize',
    validateNormalize,
    checkValidationResult,
    languageControllers.normalizeLanguage
);

export default router;
