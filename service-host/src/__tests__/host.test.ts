import { describe, it, expect, afterEach } from 'vitest';
import { PosHost } from '../host.js';
import { createTestConfig } from '../testing/fixtures.js';

describe('PosHost', () => {
  let host: PosHost | null = null;

  afterEach(async () => {
    await host?.stop();
    host = null;
  });

  it('serves the health check and creates the bootstrap admin', async () => {
    host = new PosHost(createTestConfig({ port: 0, bootstrapAdmin: { username: 'owner', pin: '4321' } }), { dbPath: ':memory:' });

    const port = await host.start();
    const res = await fetch(`http://127.0.0.1:${port}/health`);

    expect(port).toBeGreaterThan(0);
    expect(res.status).toBe(200);
    expect(host.services.sessions.login('owner', '4321', 'office', '127.0.0.1').user).toMatchObject({
      username: 'owner',
      role: 'admin',
    });
  });

  it('stops without having listened', async () => {
    const idle = new PosHost(createTestConfig(), { dbPath: ':memory:' });
    await expect(idle.stop()).resolves.toBeUndefined();
  });
});
