import { Router, RequestHandler, Response, NextFunction } from 'express';
import { AuthRequest, currentUser } from '../middleware/auth';
import { LeaveRequestService } from '../services/leaveRequestService';
import { InvalidArgumentError } from '../utils/errors';
import { serializeLeaveBalance, serializeLeaveRequest } from '../utils/serializers';
import type { CreateLeaveRequestInput, UpdateLeaveRequestInput } from '../shared/types';

const OBJECT_ID = /^[a-f\d]{24}$/i;

const validateLeaveId = (leaveId: string | undefined): string => {
  if (!leaveId || leaveId === 'undefined' || leaveId === 'null') {
    throw new InvalidArgumentError('Invalid leave request ID');
  }
  if (!OBJECT_ID.test(leaveId)) {
    throw new InvalidArgumentError('Invalid leave request ID format');
  }
  return leaveId;
};

const readField = (source: unknown, key: string): unknown =>
  typeof source === 'object' && source !== null ? Reflect.get(source, key) : undefined;

// undefined: absent, null: explicitly cleared
const readNullableString = (source: unknown, key: string): string | null | undefined => {
  const value = readField(source, key);
  if (value === undefined || value === null) return value;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${key} must be a string`);
  }
  return value;
};

const readOptionalString = (source: unknown, key: string): string | undefined => {
  const value = readNullableString(source, key);
  if (value === null) {
    throw new InvalidArgumentError(`${key} cannot be null`);
  }
  return value;
};

const readStatusQuery = (value: unknown): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError('status must be a single value');
  }
  return value;
};

export const parseCreateBody = (body: unknown): CreateLeaveRequestInput => ({
  userId: readOptionalString(body, 'userId'),
  leaveType: readOptionalString(body, 'leaveType'),
  startDate: readOptionalString(body, 'startDate'),
  endDate: readOptionalString(body, 'endDate'),
  reason: readNullableString(body, 'reason'),
  contactDuringLeave: readNullableString(body, 'contactDuringLeave'),
});

export const parseUpdateBody = (body: unknown): UpdateLeaveRequestInput => ({
  leaveType: readOptionalString(body, 'leaveType'),
  startDate: readOptionalString(body, 'startDate'),
  endDate: readOptionalString(body, 'endDate'),
  reason: readNullableString(body, 'reason'),
  contactDuringLeave: readNullableString(body, 'contactDuringLeave'),
});

export interface LeaveRequestRouterDeps {
  leaveService: LeaveRequestService;
  authenticate: RequestHandler;
}

export function createLeaveRequestRouter({ leaveService, authenticate }: LeaveRequestRouterDeps): Router {
  const router = Router();

  router.use(authenticate);

  // Submit a leave request for yourself
  router.post('/', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const created = await leaveService.create(userId, parseCreateBody(req.body));
      res.status(201).json(serializeLeaveRequest(created));
    } catch (err) {
      next(err);
    }
  });

  // My leave requests, newest first
  router.get('/', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const list = await leaveService.listOwn(userId, readStatusQuery(req.query.status));
      res.json(list.map(serializeLeaveRequest));
    } catch (err) {
      next(err);
    }
  });

  // Approval queue for the caller's team
  router.get('/pending-approval', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId, role } = currentUser(req);
      const list = await leaveService.listPendingForApprover(userId, role);
      res.json(list.map(serializeLeaveRequest));
    } catch (err) {
      next(err);
    }
  });

  // Every request in the caller's team, any status
  router.get('/all', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId, role } = currentUser(req);
      const list = await leaveService.listTeamLeaves(userId, role, readStatusQuery(req.query.status));
      res.json(list.map(serializeLeaveRequest));
    } catch (err) {
      next(err);
    }
  });

  router.get('/balance', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const balance = await leaveService.getBalance(userId);
      res.json(serializeLeaveBalance(balance));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId, role } = currentUser(req);
      const leave = await leaveService.getForViewer(validateLeaveId(req.params.id), userId, role);
      res.json(serializeLeaveRequest(leave));
    } catch (err) {
      next(err);
    }
  });

  router.put('/:id', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const updated = await leaveService.update(validateLeaveId(req.params.id), userId, parseUpdateBody(req.body));
      res.json(serializeLeaveRequest(updated));
    } catch (err) {
      next(err);
    }
  });

  // Approver id always comes from the token; any approverId in the body is ignored
  router.post('/:id/approve', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId, role } = currentUser(req);
      const leaveId = validateLeaveId(req.params.id);
      const decision = readOptionalString(req.body, 'status');
      if (!decision) {
        throw new InvalidArgumentError('status is required');
      }
      const updated = await leaveService.approveOrReject(
        leaveId,
        userId,
        role,
        decision,
        readNullableString(req.body, 'approverComments'),
      );
      res.json(serializeLeaveRequest(updated));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/cancel', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const cancelled = await leaveService.cancel(validateLeaveId(req.params.id), userId);
      res.json(serializeLeaveRequest(cancelled));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
