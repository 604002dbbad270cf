import express, { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { ok } from '@owned-tasks/protocol';
import { assertOwner, type Identity } from '../auth';
import type { TaskService } from '../tasks';
import { requireIdentity } from './authenticate';

type TaskHandler = (req: Request, res: Response, caller: Identity) => Promise<void>;

const handle = (fn: TaskHandler): RequestHandler => {
  return (req, res, next) => {
    let caller: Identity;
    try {
      caller = requireIdentity(req);
    } catch (err) {
      next(err);
      return;
    }
    fn(req, res, caller).catch(next);
  };
};

/**
 * Settles the existence stage ahead of body parsing, so an unreadable body
 * sent to a missing task is still answered with NOT_FOUND.
 */
const requireTask = (service: TaskService): RequestHandler => {
  return (req, _res, next) => {
    let caller: Identity;
    try {
      caller = requireIdentity(req);
    } catch (err) {
      next(err);
      return;
    }
    service.get(caller, req.params.ownerId, req.params.taskId).then(() => next(), next);
  };
};

/**
 * Task routes under `/:ownerId/tasks`. The owner in the path is checked
 * against the caller as soon as it is matched, and an update checks that
 * the task exists, both before any body is parsed. Mount behind
 * `authenticate`.
 */
export function createTasksRouter(service: TaskService): Router {
  const router = Router();
  const jsonBody = express.json({ limit: '16kb' });

  router.param('ownerId', (req: Request, _res: Response, next: NextFunction, ownerId: string) => {
    try {
      assertOwner(requireIdentity(req), ownerId);
      next();
    } catch (err) {
      next(err);
    }
  });

  router.get(
    '/:ownerId/tasks',
    handle(async (req, res, caller) => {
      const result = await service.list(caller, req.params.ownerId, req.query);
      res.status(200).json(ok(result));
    })
  );

  router.post(
    '/:ownerId/tasks',
    jsonBody,
    handle(async (req, res, caller) => {
      const task = await service.create(caller, req.params.ownerId, req.body);
      res.status(201).json(ok(task));
    })
  );

  router.get(
    '/:ownerId/tasks/:taskId',
    handle(async (req, res, caller) => {
      const task = await service.get(caller, req.params.ownerId, req.params.taskId);
      res.status(200).json(ok(task));
    })
  );

  router.put(
    '/:ownerId/tasks/:taskId',
    requireTask(service),
    jsonBody,
    handle(async (req, res, caller) => {
      const task = await service.update(caller, req.params.ownerId, req.params.taskId, req.body);
      res.status(200).json(ok(task));
    })
  );

  router.delete(
    '/:ownerId/tasks/:taskId',
    handle(async (req, res, caller) => {
      await service.delete(caller, req.params.ownerId, req.params.taskId);
      res.status(204).end();
    })
  );

  router.patch(
    '/:ownerId/tasks/:taskId/complete',
    handle(async (req, res, caller) => {
      const task = await service.toggleComplete(caller, req.params.ownerId, req.params.taskId);
      res.status(200).json(ok(task));
    })
  );

  return router;
}
