import jwt from 'jsonwebtoken';

export interface TokenPayload {
    personId: string;
}

const THIRTY_DAYS_SEC = 30 * 24 * 60 * 60;

export const generateToken = (personId: string, secret: string, expiresInSec = THIRTY_DAYS_SEC): string => {
    if (!secret) {
        throw new Error('JWT secret is not defined');
    }
    const payload: TokenPayload = { personId };
    return jwt.sign(payload, secret, { expiresIn: expiresInSec });
};
