import jwt from 'jsonwebtoken';
import { z } from 'zod';

const ACCESS_TOKEN_TTL_SECONDS = Number(process.env.ACCESS_TOKEN_TTL_SECONDS ?? 900);

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  tenantId: z.string().min(1),
  role: z.string().min(1)
});

export type AccessTokenPayload = z.infer<typeof accessTokenPayloadSchema>;

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET ?? '';
  if (!secret) {
    throw new Error('JWT_SECRET must be set before starting the API');
  }
  return secret;
}

export function signAccessToken(payload: AccessTokenPayload, secret: string = getJwtSecret()) {
  return jwt.sign(payload, secret, { expiresIn: ACCESS_TOKEN_TTL_SECONDS });
}

export function verifyAccessToken(token: string, secret: string = getJwtSecret()): AccessTokenPayload {
  return accessTokenPayloadSchema.parse(jwt.verify(token, secret));
}
