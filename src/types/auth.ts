/**
 * Actor Types
 *
 * Every service method receives the actor performing the action.
 * Token verification itself is delegated to the auth provider.
 */

/**
 * Actor Context - Who is performing the action
 */
export interface ActorContext {
  type: 'user' | 'system' | 'anonymous';
  userId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for background jobs and maintenance scripts
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};

/**
 * Identity returned by a verified access token
 */
export interface VerifiedIdentity {
  userId: string;
  email: string;
}

/**
 * Opaque access token verifier (Supabase Auth in production)
 * Returns null when the token is invalid or expired
 */
export interface TokenVerifier {
  verify(token: string): Promise<VerifiedIdentity | null>;
}
