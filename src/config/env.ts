import * as dotenv from 'dotenv';
dotenv.config();

const DEFAULT_VECTOR_EPSILON = 1e-9;

const parseEpsilon = (raw: string | undefined): number => {
    const value = parseFloat(raw || String(DEFAULT_VECTOR_EPSILON));
    return Number.isFinite(value) && value >= 0 ? value : DEFAULT_VECTOR_EPSILON;
};

export const config = {
    logLevel: process.env.LOG_LEVEL || 'info',
    vectorEpsilon: parseEpsilon(process.env.VECTOR_EPSILON),
};
