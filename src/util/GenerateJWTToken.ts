import jwt from 'jsonwebtoken';
import moment from 'moment-timezone';

/**
 * Generates the token the scheduler presents to remote agents.
 * 
 * @param subject who the token is issued to
 * @param signingKey the signing key
 */
export function generateJWTToken(subject: string, signingKey: string): string {

    const exp = moment().tz("UTC").add(3, "months").unix();

    return jwt.sign({ user: subject, authProvider: "taskloom", exp: exp }, signingKey);
}
