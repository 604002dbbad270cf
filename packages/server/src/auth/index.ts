/**
 * Auth Module Exports
 */
export {
  IdentityVerifier,
  signAccessToken,
  parseBearerHeader,
  TOKEN_ALGORITHM,
  DEFAULT_TOKEN_TTL_SECONDS,
  type Identity,
  type IdentityVerifierOptions,
  type AccessTokenClaims,
  type SignAccessTokenOptions,
} from './identity-verifier';
export { authorize, assertOwner, type AccessDecision } from './access-guard';
