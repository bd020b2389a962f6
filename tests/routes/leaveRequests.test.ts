import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../index';
import { config } from '../../config/env';
import type { Role } from '../../config/roles';
import { LeaveRequestService } from '../../services/leaveRequestService';
import { generateToken } from '../../utils/jwt';
import { InMemoryLeaveRequestRepository } from '../support/inMemoryLeaveRequestRepository';
import { InMemoryUserDirectory } from '../support/inMemoryUserDirectory';

const bearer = (userId: string, role: Role) =>
  `Bearer ${generateToken({ userId, username: userId, role })}`;

describe('leave request routes', () => {
  let app: Express;
  let directory: InMemoryUserDirectory;

  const employee = () => bearer('alice', 'developer');
  const manager = () => bearer('mgr', 'manager');
  const outsideLead = () => bearer('lead2', 'team_lead');

  const fileSickLeave = () =>
    request(app)
      .post('/api/leave-requests')
      .set('Authorization', employee())
      .send({ userId: 'alice', leaveType: 'sick', startDate: '2024-01-10', endDate: '2024-01-12', reason: 'Flu' });

  beforeEach(() => {
    directory = new InMemoryUserDirectory();
    directory.addUser('alice', 'developer');
    directory.addUser('bob', 'developer');
    directory.addUser('mgr', 'manager');
    directory.addUser('lead2', 'team_lead');
    directory.addUser('admin', 'admin');
    directory.setTeam('mgr', ['alice', 'bob']);

    const leaveService = new LeaveRequestService({
      repository: new InMemoryLeaveRequestRepository(),
      directory,
    });
    app = createApp({ directory, leaveService });
  });

  it('answers the ping route', async () => {
    const res = await request(app).get('/api/ping');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: config.pingMessage });
  });

  describe('authentication', () => {
    it('requires a token', async () => {
      const res = await request(app).get('/api/leave-requests');
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: 'Access token required' });
    });

    it('rejects a bad token', async () => {
      const res = await request(app).get('/api/leave-requests').set('Authorization', 'Bearer not-a-token');
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ message: 'Invalid or expired token' });
    });

    it('rejects deactivated users', async () => {
      directory.addUser('alice', 'developer', { isActive: false });
      const res = await request(app).get('/api/leave-requests').set('Authorization', employee());
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: 'User not found or inactive' });
    });

    it('uses the directory role over the token role', async () => {
      const res = await request(app)
        .get('/api/leave-requests/pending-approval')
        .set('Authorization', bearer('alice', 'admin'));
      expect(res.status).toBe(403);
    });
  });

  describe('POST /api/leave-requests', () => {
    it('creates a pending request', async () => {
      const res = await fileSickLeave();
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        id: '000000000000000000000001',
        userId: 'alice',
        leaveType: 'sick',
        status: 'pending',
        durationDays: 3,
        approverId: null,
        approvedAt: null,
      });
      expect(res.body.createdAt).toBe(res.body.updatedAt);
    });

    it('refuses requests for other users', async () => {
      const res = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', employee())
        .send({ userId: 'bob', leaveType: 'sick', startDate: '2024-01-10', endDate: '2024-01-12' });
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ message: 'Cannot request leave for other users', code: 'FORBIDDEN' });
    });

    it('rejects an inverted range', async () => {
      const res = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', employee())
        .send({ userId: 'alice', leaveType: 'sick', startDate: '2024-01-12', endDate: '2024-01-10' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'endDate must not be before startDate', code: 'INVALID_ARGUMENT' });
    });

    it('rejects non-string fields', async () => {
      const res = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', employee())
        .send({ userId: 'alice', leaveType: 5, startDate: '2024-01-10', endDate: '2024-01-12' });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe('leaveType must be a string');
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', employee())
        .set('Content-Type', 'application/json')
        .send('{"userId":');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'Malformed JSON body', code: 'INVALID_ARGUMENT' });
    });
  });

  describe('GET /api/leave-requests/:id', () => {
    it('validates the id', async () => {
      const missing = await request(app).get('/api/leave-requests/undefined').set('Authorization', employee());
      expect(missing.status).toBe(400);
      expect(missing.body.message).toBe('Invalid leave request ID');

      const malformed = await request(app).get('/api/leave-requests/abc').set('Authorization', employee());
      expect(malformed.status).toBe(400);
      expect(malformed.body.message).toBe('Invalid leave request ID format');
    });

    it('returns 404 for an unknown request', async () => {
      const res = await request(app)
        .get('/api/leave-requests/0000000000000000000000ff')
        .set('Authorization', employee());
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: 'Leave request not found', code: 'NOT_FOUND' });
    });

    it('lets the manager view but not a coworker', async () => {
      const { body } = await fileSickLeave();
      const asManager = await request(app).get(`/api/leave-requests/${body.id}`).set('Authorization', manager());
      expect(asManager.status).toBe(200);
      expect(asManager.body.id).toBe(body.id);

      const asCoworker = await request(app)
        .get(`/api/leave-requests/${body.id}`)
        .set('Authorization', bearer('bob', 'developer'));
      expect(asCoworker.status).toBe(403);
    });
  });

  describe('approval', () => {
    it('approves once and takes the approver from the token', async () => {
      const { body } = await fileSickLeave();

      const approved = await request(app)
        .post(`/api/leave-requests/${body.id}/approve`)
        .set('Authorization', manager())
        .send({ status: 'approved', approverComments: 'ok', approverId: 'admin' });
      expect(approved.status).toBe(200);
      expect(approved.body).toMatchObject({ status: 'approved', approverId: 'mgr', approverComments: 'ok' });
      expect(typeof approved.body.approvedAt).toBe('string');

      const again = await request(app)
        .post(`/api/leave-requests/${body.id}/approve`)
        .set('Authorization', manager())
        .send({ status: 'rejected' });
      expect(again.status).toBe(400);
      expect(again.body).toEqual({ message: 'Can only approve or reject pending requests', code: 'INVALID_STATE' });
    });

    it('refuses an approver outside the team', async () => {
      const { body } = await fileSickLeave();
      const res = await request(app)
        .post(`/api/leave-requests/${body.id}/approve`)
        .set('Authorization', outsideLead())
        .send({ status: 'approved' });
      expect(res.status).toBe(403);
      expect(res.body.message).toBe('Cannot approve or reject leave requests for users outside your team');
    });

    it('requires a decision', async () => {
      const { body } = await fileSickLeave();
      const res = await request(app)
        .post(`/api/leave-requests/${body.id}/approve`)
        .set('Authorization', manager())
        .send({});
      expect(res.status).toBe(400);
      expect(res.body.message).toBe('status is required');
    });

    it('lists the manager’s queue and refuses employees', async () => {
      const { body } = await fileSickLeave();

      const queue = await request(app).get('/api/leave-requests/pending-approval').set('Authorization', manager());
      expect(queue.status).toBe(200);
      expect(queue.body.map((r: { id: string }) => r.id)).toEqual([body.id]);

      const denied = await request(app).get('/api/leave-requests/pending-approval').set('Authorization', employee());
      expect(denied.status).toBe(403);
      expect(denied.body.message).toBe('Not authorized to approve leave requests');
    });
  });

  describe('cancel and update', () => {
    it('lets only the owner cancel', async () => {
      const { body } = await fileSickLeave();

      const byManager = await request(app).post(`/api/leave-requests/${body.id}/cancel`).set('Authorization', manager());
      expect(byManager.status).toBe(403);

      const byOwner = await request(app).post(`/api/leave-requests/${body.id}/cancel`).set('Authorization', employee());
      expect(byOwner.status).toBe(200);
      expect(byOwner.body.status).toBe('cancelled');
    });

    it('updates a pending request', async () => {
      const { body } = await fileSickLeave();
      const res = await request(app)
        .put(`/api/leave-requests/${body.id}`)
        .set('Authorization', employee())
        .send({ endDate: '2024-01-11', contactDuringLeave: 'phone' });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ endDate: '2024-01-11', durationDays: 2, contactDuringLeave: 'phone' });
    });
  });

  describe('listing and balance', () => {
    it('lists own requests and validates the status filter', async () => {
      await fileSickLeave();
      const own = await request(app).get('/api/leave-requests?status=pending').set('Authorization', employee());
      expect(own.status).toBe(200);
      expect(own.body).toHaveLength(1);

      const bad = await request(app).get('/api/leave-requests?status=archived').set('Authorization', employee());
      expect(bad.status).toBe(400);
      expect(bad.body.message).toBe('Unknown status "archived"');
    });

    it('reports the caller’s balance', async () => {
      const res = await request(app).get('/api/leave-requests/balance').set('Authorization', employee());
      expect(res.status).toBe(200);
      expect(res.body.userId).toBe('alice');
      expect(res.body.balances.sick).toEqual({ allotted: 12, used: 0, remaining: 12 });
      expect(res.body.totalAvailable).toBe(60);
    });
  });

  it('returns 404 for unknown API routes', async () => {
    const res = await request(app).get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: 'Route GET /nope not found' });
  });
});
