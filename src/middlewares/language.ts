import {query} from "express-validator";

export const validateMatch = [
    query("available")
        .exists().withMessage("available is required")
        .bail()
        .isString().withMessage("available must be a comma-separated list")
        .bail()
        .trim()
        .notEmpty().withMessage("available must list at least one language"),
    query("default").optional().isString().trim(),
];

export const validateAccepts = [
    query("lang")
        .exists().withMessage("lang is required")
        .bail()
        .isString()
        .trim()
        .notEmpty().withMessage("lang must not be empty"),
    query("exact").optional().isIn(["true", "false", "1", "0"]).withMessage("exact must be a boolean"),
];

export const validateNormalize = [
    query("code")
        .exists().withMessage("code is required")
        .bail()
        .isString()
        .trim()
        .notEmpty().withMessage("code must not be empty"),
];
