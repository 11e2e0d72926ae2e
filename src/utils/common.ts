import {validationResult} from "express-validator";
import {NextFunction, Request, Response} from "express";

// Middleware to check validation results
const checkValidationResult = (req: Request, res: Response, next: NextFunction) => {
    const result = validationResult(req);
    if (!result.isEmpty()) {
        return res.status(400).json({errors: result.array()});
    }
    next();
};

export default checkValidationResult;
