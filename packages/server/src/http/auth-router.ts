import express, { Router } from 'express';
import { ok } from '@owned-tasks/protocol';
import type { AccountService } from '../accounts';

/**
 * Account routes, served without a bearer token:
 *   POST /auth/signup  -> 201 { message, userId }
 *   POST /auth/signin  -> 200 { access_token, token_type, user }
 */
export function createAuthRouter(accounts: AccountService): Router {
  const router = Router();
  const jsonBody = express.json({ limit: '16kb' });

  router.post('/auth/signup', jsonBody, (req, res, next) => {
    accounts
      .signUp(req.body)
      .then((created) => {
        res.status(201).json(ok(created));
      })
      .catch(next);
  });

  router.post('/auth/signin', jsonBody, (req, res, next) => {
    accounts
      .signIn(req.body)
      .then((session) => {
        res.status(200).json(ok(session));
      })
      .catch(next);
  });

  return router;
}
