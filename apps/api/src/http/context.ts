import type { AppConfig } from '../config';
import type { DB } from '../db';
import type { User } from '../db/schema';
import type { TokenService } from '../services/auth-tokens';
import type { IngredientRecognizer } from '../services/ingredient-recognition';

export type AuthFailure = 'invalid_token' | 'inactive_user';

declare module 'fastify' {
  interface FastifyInstance {
    db: DB;
    config: AppConfig;
    tokens: TokenService;
    recognizer: IngredientRecognizer;
  }

  interface FastifyRequest {
    // Set by the authenticate hook; null for anonymous requests
    user: User | null;
    authFailure: AuthFailure | null;
  }
}
