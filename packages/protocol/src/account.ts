import { z } from 'zod';
import { parseWith, type PayloadParseResult } from './payload.js';

export const PASSWORD_MIN_LENGTH = 8;
export const USER_NAME_MAX_LENGTH = 100;

/** Public view of an account; never carries the password hash */
export interface User {
  id: string;
  email: string;
  name: string;
}

export interface SignUpRequest {
  email: string;
  password: string;
  name: string;
}

export interface SignInRequest {
  email: string;
  password: string;
}

export interface SignUpResponse {
  message: string;
  userId: string;
}

/** Sign-in result; field names follow the OAuth token response */
export interface AuthTokenResponse {
  access_token: string;
  token_type: 'bearer';
  user: User;
}

// Emails are compared and stored lower-cased.
const emailSchema = z
  .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
  .trim()
  .toLowerCase()
  .email('must be a valid email address');

const signUpRequestSchema = z
  .object({
    email: emailSchema,
    password: z
      .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
      .min(PASSWORD_MIN_LENGTH, `must be at least ${PASSWORD_MIN_LENGTH} characters`),
    name: z
      .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
      .trim()
      .min(1, 'must not be empty')
      .max(USER_NAME_MAX_LENGTH, `must be at most ${USER_NAME_MAX_LENGTH} characters`),
  })
  .strict();

const signInRequestSchema = z
  .object({
    email: emailSchema,
    password: z
      .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
      .min(1, 'is required'),
  })
  .strict();

export const parseSignUpRequest = (raw: unknown): PayloadParseResult<SignUpRequest> =>
  parseWith(signUpRequestSchema, raw);

export const parseSignInRequest = (raw: unknown): PayloadParseResult<SignInRequest> =>
  parseWith(signInRequestSchema, raw);
