import type { Server } from 'node:http';
import express from 'express';
import { afterEach, describe, it, expect } from 'vitest';
import { createAdminGuard, passwordMatches } from './auth.js';

let server: Server | null = null;

async function serve(adminPassword: string | null): Promise<string> {
  const app = express();
  app.post('/guarded', createAdminGuard(adminPassword), (_req, res) => {
    res.json({ ok: true });
  });
  const listening = app.listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (!address || typeof address === 'string') throw new Error('server has no TCP address');
  return `http://127.0.0.1:${address.port}/guarded`;
}

afterEach(async () => {
  const current = server;
  server = null;
  if (!current) return;
  current.closeAllConnections();
  await new Promise<void>((resolve) => current.close(() => resolve()));
});

describe('passwordMatches', () => {
  it('compares tokens of any length', () => {
    expect(passwordMatches('test-secret', 'test-secret')).toBe(true);
    expect(passwordMatches('test', 'test-secret')).toBe(false);
    expect(passwordMatches('', 'test-secret')).toBe(false);
  });
});

describe('createAdminGuard', () => {
  it('lets a matching bearer token through', async () => {
    const url = await serve('test-secret');
    const response = await fetch(url, { method: 'POST', headers: { Authorization: 'Bearer test-secret' } });
    expect(response.status).toBe(200);
  });

  it('answers 401 without a well-formed bearer token', async () => {
    const url = await serve('test-secret');
    const variants: Array<Record<string, string>> = [
      {},
      { Authorization: 'Basic dGVzdA==' },
      { Authorization: 'Bearer a b' },
    ];
    for (const headers of variants) {
      expect((await fetch(url, { method: 'POST', headers })).status).toBe(401);
    }
  });

  it('answers 403 for a wrong password', async () => {
    const url = await serve('test-secret');
    const response = await fetch(url, { method: 'POST', headers: { Authorization: 'Bearer nope' } });
    expect(response.status).toBe(403);
  });

  it('answers 503 when no password is configured', async () => {
    const url = await serve(null);
    const response = await fetch(url, { method: 'POST', headers: { Authorization: 'Bearer test-secret' } });
    expect(response.status).toBe(503);
  });
});
