/**
 * Delegation route tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createPresenceClaim, generateKeyPair, type KeyPair } from '@civitas/sdk';
import { DAY, NOW, createTestBridge, type TestBridge } from './helpers.js';

const alice = generateKeyPair();
const bob = generateKeyPair();
const carol = generateKeyPair();

describe('Delegation routes', () => {
  let bridge: TestBridge;

  beforeEach(() => {
    bridge = createTestBridge();
  });

  async function delegate(from: KeyPair, to: string, fraction: string) {
    const args = { delegatee: to, fraction, validUntil: NOW + DAY };
    const presence = await createPresenceClaim(from.privateKey, 'make_delegation', args, NOW);
    return request(bridge.app)
      .post('/delegation')
      .send({ delegator: from.address, ...args, presence });
  }

  async function undelegate(from: KeyPair, to: string) {
    const presence = await createPresenceClaim(from.privateKey, 'remove_delegation', { delegatee: to }, NOW);
    return request(bridge.app).delete('/delegation').send({ delegator: from.address, delegatee: to, presence });
  }

  describe('POST /delegation', () => {
    it('should create a delegation with a canonical fraction', async () => {
      const res = await delegate(alice, bob.address, '0.40');

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        delegator: alice.address,
        delegatee: bob.address,
        fraction: '0.4',
        validUntil: NOW + DAY,
      });
    });

    it('should return 422 when the total would exceed 100%', async () => {
      await delegate(alice, bob.address, '0.4');

      const res = await delegate(alice, carol.address, '0.7');

      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: 'Total delegation cannot exceed 100%', code: 'CAP_EXCEEDED' });
    });

    it('should return 400 for self-delegation', async () => {
      const res = await delegate(alice, alice.address, '0.5');

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Cannot delegate to yourself', code: 'VALIDATION_ERROR' });
    });

    it('should return 400 when required fields are missing', async () => {
      const res = await request(bridge.app).post('/delegation').send({ delegator: alice.address });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid request');
    });

    it('should return 403 when the claim was signed by another account', async () => {
      const args = { delegatee: carol.address, fraction: '0.5', validUntil: NOW + DAY };
      const presence = await createPresenceClaim(bob.privateKey, 'make_delegation', args, NOW);

      const res = await request(bridge.app)
        .post('/delegation')
        .send({ delegator: alice.address, ...args, presence });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({
        error: `Presence of ${alice.address} not proven: Claim is for ${bob.address}, not ${alice.address}`,
        code: 'NOT_AUTHORIZED',
      });
      expect(bridge.delegation.getDelegations(alice.address)).toEqual([]);
    });

    it('should return 403 when the signed terms were altered', async () => {
      const args = { delegatee: bob.address, fraction: '0.1', validUntil: NOW + DAY };
      const presence = await createPresenceClaim(alice.privateKey, 'make_delegation', args, NOW);

      const res = await request(bridge.app)
        .post('/delegation')
        .send({ delegator: alice.address, ...args, fraction: '1', presence });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({
        error: `Presence of ${alice.address} not proven: Claim was signed for other make_delegation arguments`,
        code: 'NOT_AUTHORIZED',
      });
      expect(bridge.delegation.getDelegations(alice.address)).toEqual([]);
    });
  });

  describe('reads', () => {
    it('should expose both sides of a delegation', async () => {
      await delegate(alice, bob.address, '0.4');

      const forward = await request(bridge.app).get(`/delegation/${alice.address}`);
      expect(forward.body).toEqual({
        delegator: alice.address,
        delegations: [{ delegatee: bob.address, fraction: '0.4', validUntil: NOW + DAY }],
        committedFraction: '0.4',
      });

      const reverse = await request(bridge.app).get(`/delegation/delegatees/${bob.address}`);
      expect(reverse.body).toEqual({
        delegatee: bob.address,
        delegators: [{ delegator: alice.address, fraction: '0.4' }],
      });

      const single = await request(bridge.app).get(`/delegation/delegatees/${bob.address}/${alice.address}`);
      expect(single.body).toEqual({ delegatee: bob.address, delegator: alice.address, fraction: '0.4' });
    });

    it('should return 404 for a pair with no delegation', async () => {
      const res = await request(bridge.app).get(`/delegation/delegatees/${carol.address}/${alice.address}`);

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('NOT_FOUND');
    });

    it('should not read the bare delegatees path as a delegator address', async () => {
      const res = await request(bridge.app).get('/delegation/delegatees');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Delegatee address required', code: 'VALIDATION_ERROR' });
    });

    it('should return an empty list for an account with no delegations', async () => {
      const res = await request(bridge.app).get(`/delegation/${carol.address}`);

      expect(res.body).toEqual({ delegator: carol.address, delegations: [], committedFraction: '0' });
    });
  });

  describe('DELETE /delegation', () => {
    it('should remove a delegation, then report it missing', async () => {
      await delegate(alice, bob.address, '0.4');

      const first = await undelegate(alice, bob.address);
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ delegator: alice.address, delegatee: bob.address, removed: true });

      const second = await undelegate(alice, bob.address);
      expect(second.status).toBe(404);
      expect(second.body).toEqual({ error: 'No delegations found for this account', code: 'NOT_FOUND' });
    });

    it('should not let one removal claim remove another delegatee', async () => {
      await delegate(alice, bob.address, '0.4');
      await delegate(alice, carol.address, '0.3');
      const presence = await createPresenceClaim(alice.privateKey, 'remove_delegation', { delegatee: bob.address }, NOW);

      const first = await request(bridge.app)
        .delete('/delegation')
        .send({ delegator: alice.address, delegatee: bob.address, presence });
      expect(first.status).toBe(200);

      const reused = await request(bridge.app)
        .delete('/delegation')
        .send({ delegator: alice.address, delegatee: carol.address, presence });
      expect(reused.status).toBe(403);
      expect(reused.body.code).toBe('NOT_AUTHORIZED');
      expect(bridge.delegation.getDelegations(alice.address)).toEqual([
        { delegatee: carol.address, fraction: '0.3', validUntil: NOW + DAY },
      ]);
    });

    it('should not accept the same removal claim twice', async () => {
      await delegate(alice, bob.address, '0.4');
      const presence = await createPresenceClaim(alice.privateKey, 'remove_delegation', { delegatee: bob.address }, NOW);
      const body = { delegator: alice.address, delegatee: bob.address, presence };

      await request(bridge.app).delete('/delegation').send(body);
      await delegate(alice, bob.address, '0.4');

      const replayed = await request(bridge.app).delete('/delegation').send(body);
      expect(replayed.status).toBe(403);
      expect(replayed.body).toEqual({
        error: `Presence of ${alice.address} not proven: Claim has already been used`,
        code: 'NOT_AUTHORIZED',
      });
      expect(bridge.delegation.getDelegateeDelegators(bob.address, alice.address)).toBe('0.4');
    });
  });
});
