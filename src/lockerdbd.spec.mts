// @author lockerdb contributors
// @date 2026-10-19
import request from 'supertest';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import type { Express } from 'express';
import { createApp } from './lockerdbd.mjs';
import { CollectionStore } from './collection-store.mjs';
import { Namespace } from './namespace.mjs';
import { createAuthenticator } from './authentication.mjs';
import type { LockerConfig } from './config.mjs';

interface RecordBody {
  record: { _id: string; _version: number; [key: string]: unknown };
}

describe('lockerdb daemon', () => {
  let tempDir: string;
  let app: Express;
  let bearer: string;

  const credentials = {
    username: 'admin',
    password: 'test-password',
    host: 'localhost',
    port: '4141',
    schema_name: 'public',
  };

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lockerdb-daemon-'));
    const config: LockerConfig = {
      username: 'admin',
      password: 'test-password',
      host: 'localhost',
      port: '4141',
      schemaName: 'public',
      dataDir: tempDir,
      configPath: path.join(tempDir, 'config.json'),
    };
    const store = new CollectionStore(new Namespace({ rootDir: tempDir, defaultSchema: 'public' }));
    await store.ensureSchema('public');
    const authenticator = createAuthenticator({ secret: 'test-secret', username: 'admin', password: 'test-password' });
    app = createApp({ store, config, authenticator });

    const res = await request(app).post('/v1/connect').send(credentials);
    bearer = `Bearer ${(res.body as { token: string }).token}`;
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('POST /v1/connect', () => {
    it('returns a token and creates the schema directory', async () => {
      const res = await request(app)
        .post('/v1/connect')
        .send({ ...credentials, schema_name: 'shop' });

      expect(res.status).toBe(200);
      expect((res.body as { message: string }).message).toBe('Connected to schema shop');
      expect((res.body as { token?: string }).token).toBeDefined();
      expect((await fs.stat(path.join(tempDir, 'shop'))).isDirectory()).toBe(true);
    });

    it('rejects wrong credentials', async () => {
      const res = await request(app)
        .post('/v1/connect')
        .send({ ...credentials, password: 'wrong' });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'invalid username or password' });
    });

    it('rejects incomplete details', async () => {
      const res = await request(app)
        .post('/v1/connect')
        .send({ ...credentials, host: '' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'host is required' });
    });
  });

  describe('REST API', () => {
    it('requires a bearer token', async () => {
      const res = await request(app).get('/v1/public');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'No token provided' });
    });

    it('runs a collection through its lifecycle', async () => {
      const created = await request(app).post('/v1/public/users/create').set('Authorization', bearer).send({});
      expect(created.status).toBe(200);
      expect(created.body).toEqual({ message: 'Collection users created', records: [] });

      const duplicate = await request(app).post('/v1/public/users/create').set('Authorization', bearer).send({});
      expect(duplicate.status).toBe(409);

      const inserted = await request(app)
        .post('/v1/public/users')
        .set('Authorization', bearer)
        .send({ data: '{"name":"bob"}' });
      expect(inserted.status).toBe(201);
      const bob = (inserted.body as RecordBody).record;
      expect(bob.name).toBe('bob');
      expect(bob._version).toBe(0);

      await request(app)
        .post('/v1/public/users')
        .set('Authorization', bearer)
        .send({ data: { name: 'alice' } })
        .expect(201);

      const updated = await request(app)
        .put(`/v1/public/users/${bob._id}`)
        .set('Authorization', bearer)
        .send({ data: { name: 'robert' } });
      expect(updated.status).toBe(200);
      expect((updated.body as RecordBody).record).toMatchObject({ _id: bob._id, name: 'robert', _version: 1 });

      const read = await request(app).get('/v1/public/users').set('Authorization', bearer);
      expect(read.status).toBe(200);
      const names = (read.body as { records: { name: string }[] }).records.map((r) => r.name);
      expect(names).toEqual(['robert', 'alice']);

      const deleted = await request(app).delete(`/v1/public/users/${bob._id}`).set('Authorization', bearer);
      expect(deleted.body).toEqual({ message: `Record ${bob._id} deleted`, removed: 1 });

      const again = await request(app).delete(`/v1/public/users/${bob._id}`).set('Authorization', bearer);
      expect(again.status).toBe(404);

      const dropped = await request(app).delete('/v1/public/users').set('Authorization', bearer);
      expect(dropped.body).toEqual({ message: 'Collection users dropped' });

      const gone = await request(app).get('/v1/public/users').set('Authorization', bearer);
      expect(gone.status).toBe(404);
    });

    it('lists collections in name order', async () => {
      await request(app).post('/v1/catalog/zebras/create').set('Authorization', bearer).send({}).expect(200);
      await request(app).post('/v1/catalog/apes/create').set('Authorization', bearer).send({}).expect(200);

      const res = await request(app).get('/v1/catalog').set('Authorization', bearer);

      expect(res.body).toEqual({ collections: ['apes', 'zebras'] });
    });

    it('rejects an insert without data', async () => {
      const res = await request(app).post('/v1/public/logs').set('Authorization', bearer).send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'invalid request body' });
    });

    it('rejects data that is not a JSON object', async () => {
      const res = await request(app).post('/v1/public/logs').set('Authorization', bearer).send({ data: '[1,2]' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Record data must be a JSON object' });
    });

    it('reports a missing record as not found', async () => {
      await request(app).post('/v1/public/tags/create').set('Authorization', bearer).send({}).expect(200);

      const res = await request(app)
        .put('/v1/public/tags/nope')
        .set('Authorization', bearer)
        .send({ data: { label: 'x' } });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Record with _id nope not found in collection tags' });
    });
  });

  describe('web UI', () => {
    it('creates a collection from the index page form', async () => {
      const res = await request(app).post('/web/create').type('form').send({ collection_name: 'notes', data: '' });

      expect(res.status).toBe(200);
      expect(res.text).toContain('<p class="message">Collection notes created</p>');
      expect(res.text).toContain('<a href="/collections/public/notes">notes</a>');
    });

    it('requires a collection name', async () => {
      const res = await request(app).post('/web/create').type('form').send({ collection_name: '' });

      expect(res.status).toBe(400);
      expect(res.text).toContain('Error: Collection name is required');
    });

    it('inserts, edits and deletes records from the collection page', async () => {
      await request(app).post('/web/create').type('form').send({ collection_name: 'posts' }).expect(200);

      const inserted = await request(app)
        .post('/web/insert')
        .type('form')
        .send({ schema_name: 'public', collection_name: 'posts', data: '{"title":"<hello>"}' });
      expect(inserted.status).toBe(200);
      expect(inserted.text).toContain('<p class="message">Record inserted</p>');
      expect(inserted.text).toContain('&quot;title&quot;: &quot;&lt;hello&gt;&quot;');

      const read = await request(app).get('/v1/public/posts').set('Authorization', bearer);
      const [post] = (read.body as { records: { _id: string }[] }).records;

      const edited = await request(app)
        .post('/web/edit')
        .type('form')
        .send({ schema_name: 'public', collection_name: 'posts', id: post._id, data: '{"title":"bye"}' });
      expect(edited.text).toContain(`<p class="message">Record ${post._id} updated</p>`);
      expect(edited.text).toContain('&quot;_version&quot;: 1');

      const deleted = await request(app)
        .post('/web/delete')
        .type('form')
        .send({ schema_name: 'public', collection_name: 'posts', id: post._id });
      expect(deleted.text).toContain('<p>No records.</p>');
    });

    it('drops a collection and returns to the index', async () => {
      await request(app).post('/web/create').type('form').send({ collection_name: 'scratch' }).expect(200);

      const res = await request(app)
        .post('/web/drop')
        .type('form')
        .send({ schema_name: 'public', collection_name: 'scratch' });

      expect(res.status).toBe(200);
      expect(res.text).toContain('<p class="message">Collection scratch dropped</p>');
      expect(res.text).not.toContain('/collections/public/scratch');
    });

    it('shows an error for a missing collection', async () => {
      const res = await request(app).get('/collections/public/missing');

      expect(res.status).toBe(404);
      expect(res.text).toContain('Error: Collection missing does not exist in');
    });

    it('serves the API docs', async () => {
      const res = await request(app).get('/api-docs/');

      expect(res.status).toBe(200);
      expect(res.text).toContain('swagger-ui');
    });
  });
});
