import type { TokenPayload } from './middleware/auth.js';

export interface AppEnv {
  Variables: {
    requestId: string;
    admin?: TokenPayload;
  };
}
