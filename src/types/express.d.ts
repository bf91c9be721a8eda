import type { AccessTokenPayload } from '../lib/auth';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      auth?: {
        userId: string;
        tenantId: string;
        role: AccessTokenPayload['role'];
      };
    }
  }
}

export {};
