import {Response} from "express";
import type {ParsedQs} from "qs";
import {ApiErrorCode} from "../constants/errorCodes";

interface ApiResponse<T> {
    data?: T;
    code?: ApiErrorCode;
    message?: string;
}

export type QueryParamValue = undefined | string | ParsedQs | (string | ParsedQs)[];

export function sendResponse<T>(
    res: Response,
    statusCode: number,
    response: ApiResponse<T>,
) {
    return res.status(statusCode).json(response);
}

// First string value of a query parameter (?a=x&a=y => 'x').
export const getSingleParam = (value: QueryParamValue): string | undefined => {
    if (typeof value === 'string') {
        return value;
    }
    if (Array.isArray(value)) {
        const first = value[0];
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
};

export const parseBoolean = (value: QueryParamValue, fallback: boolean) => {
    const raw = getSingleParam(value);
    if (!raw) {
        return fallback;
    }
    return raw === 'true' || raw === '1';
};

export const parseList = (value: QueryParamValue): string[] => {
    const raw = getSingleParam(value);
    if (!raw) {
        return [];
    }
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
};
