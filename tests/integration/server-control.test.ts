import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { isServerRunning, startServer, stopServer } from '../../src/server-control';
import { testConfig } from '../helpers/services';

const asAdmin = { 'X-Actor-Id': 'admin-1', 'X-Actor-Role': 'admin' };

describe('Server lifecycle', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await stopServer();
    for (const dir of dirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should start, serve and stop', async () => {
    const server = await startServer(testConfig({ PORT: 0 }));
    expect(isServerRunning()).toBe(true);

    await request(server).get('/api/health').expect(200);

    await stopServer();
    expect(isServerRunning()).toBe(false);
  });

  it('should refuse to start twice', async () => {
    await startServer(testConfig({ PORT: 0 }));

    await expect(startServer(testConfig({ PORT: 0 }))).rejects.toThrow('Server is already started');
  });

  it('should reload the committed ledger after a restart', async () => {
    const dataDir = await mkdtemp(join(tmpdir(), 'ledger-'));
    dirs.push(dataDir);
    const config = testConfig({ PORT: 0, DATA_DIR: dataDir });

    const first = await startServer(config);
    const created = await request(first)
      .post('/api/categories')
      .set(asAdmin)
      .send({ name: 'Beverages', shortDescription: 'Drinks' })
      .expect(201);
    await stopServer();

    const second = await startServer(config);
    const listed = await request(second).get('/api/categories').expect(200);
    expect(listed.body.data.map((c: { id: string }) => c.id)).toEqual([created.body.data.id]);

    const audit = await request(second).get('/api/audit').set(asAdmin).expect(200);
    expect(audit.body.data).toHaveLength(1);
  });
});
