// @author lockerdb contributors
// @date 2026-10-19
import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import express, { type Response } from 'express';
import swaggerUi from 'swagger-ui-express';
import swaggerJsdoc from 'swagger-jsdoc';
import cors from 'cors';
import { CollectionStore } from './collection-store.mjs';
import { Namespace } from './namespace.mjs';
import { ConfigError, parseConnectionDetails, type LockerConfig } from './config.mjs';
import {
  addTokenToResponse,
  createAuthenticator,
  InvalidCredentialsError,
  resolveJwtSecret,
  type AuthenticatedRequest,
  type Authenticator,
} from './authentication.mjs';
import { getErrorMessage, httpStatusFor, InvalidEncodingError } from './errors.mjs';
import { isJsonObject, type JsonObject, type RecordInput } from './record-codec.mjs';
import { renderCollectionPage, renderIndexPage, type PageNotice } from './web/pages.mjs';

export interface AppContext {
  store: CollectionStore;
  config: LockerConfig;
  authenticator: Authenticator;
}

function statusFor(error: unknown): number {
  if (error instanceof ConfigError) return 400;
  if (error instanceof InvalidCredentialsError) return 401;
  return httpStatusFor(error);
}

function sendApiError(res: Response, error: unknown, context: string): void {
  const status = statusFor(error);
  if (status >= 500) console.error(`${context} error:`, error);
  res.status(status).json({ error: getErrorMessage(error) });
}

/**
 * Record carried in the `data` field of a request body: JSON object text, or an object.
 * @returns undefined when the field is absent or empty.
 */
function recordFromBody(body: unknown): RecordInput | undefined {
  if (!isJsonObject(body)) return undefined;
  const data = body['data'];
  if (data === undefined || data === null || data === '') return undefined;
  if (typeof data === 'string' || isJsonObject(data)) return data;
  throw new InvalidEncodingError('data must be JSON object text or an object');
}

function formField(body: unknown, name: string): string {
  if (!isJsonObject(body)) return '';
  const value = body[name];
  return typeof value === 'string' ? value.trim() : '';
}

export function createApp({ store, config, authenticator }: AppContext): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const swaggerOptions = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'lockerdb API',
        version: '1.0.0',
        description: 'Encrypted collection store',
      },
      servers: [{ url: `http://${config.host}:${config.port}` }],
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
      },
      security: [{ bearerAuth: [] }],
    },
    apis: [fileURLToPath(import.meta.url)],
  };
  const swaggerSpec = swaggerJsdoc(swaggerOptions);
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  const api = express.Router();

  /**
   * @swagger
   * /v1/connect:
   *   post:
   *     summary: Check connection details and obtain a bearer token
   *     security: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               username: { type: string }
   *               password: { type: string }
   *               host: { type: string }
   *               port: { type: string }
   *               schema_name: { type: string }
   *     responses:
   *       200:
   *         description: Connected; the schema directory exists
   *       400:
   *         description: A field is missing
   *       401:
   *         description: Wrong username or password
   */
  api.post('/connect', async (req, res) => {
    try {
      const details = parseConnectionDetails(req.body);
      const token = authenticator.connect(details);
      await store.ensureSchema(details.schemaName);
      res.json({ message: `Connected to schema ${details.schemaName}`, token });
    } catch (error) {
      sendApiError(res, error, 'Connect');
    }
  });

  api.use(authenticator.authenticateToken);

  /**
   * @swagger
   * /v1/{schema}:
   *   get:
   *     summary: List the collections of a schema
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *     responses:
   *       200:
   *         description: Sorted collection names
   */
  api.get('/:schema', async (req: AuthenticatedRequest, res) => {
    try {
      const collections = await store.list(req.params['schema'] ?? '');
      res.json(addTokenToResponse(req, { collections }));
    } catch (error) {
      sendApiError(res, error, 'List collections');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}/create:
   *   post:
   *     summary: Create a collection, optionally with a first record
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               data: { description: 'JSON object, or JSON object text' }
   *     responses:
   *       200:
   *         description: Created
   *       409:
   *         description: The collection already exists
   */
  api.post('/:schema/:collection/create', async (req: AuthenticatedRequest, res) => {
    const collection = req.params['collection'] ?? '';
    try {
      const records = await store.create(req.params['schema'] ?? '', collection, recordFromBody(req.body));
      res.json(addTokenToResponse(req, { message: `Collection ${collection} created`, records }));
    } catch (error) {
      sendApiError(res, error, 'Create collection');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}:
   *   post:
   *     summary: Insert a record, creating the collection if needed
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               data: { description: 'JSON object, or JSON object text' }
   *     responses:
   *       201:
   *         description: The stored record
   *       400:
   *         description: data is missing or not a JSON object
   */
  api.post('/:schema/:collection', async (req: AuthenticatedRequest, res) => {
    try {
      const input = recordFromBody(req.body);
      if (input === undefined) {
        res.status(400).json({ error: 'invalid request body' });
        return;
      }
      const record = await store.insert(req.params['schema'] ?? '', req.params['collection'] ?? '', input);
      res.status(201).json(addTokenToResponse(req, { message: 'Record inserted', record }));
    } catch (error) {
      sendApiError(res, error, 'Insert record');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}:
   *   get:
   *     summary: Read every record of a collection
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *     responses:
   *       200:
   *         description: Records in stored order
   *       404:
   *         description: The collection does not exist
   */
  api.get('/:schema/:collection', async (req: AuthenticatedRequest, res) => {
    try {
      const records = await store.load(req.params['schema'] ?? '', req.params['collection'] ?? '');
      res.json(addTokenToResponse(req, { records }));
    } catch (error) {
      sendApiError(res, error, 'Read collection');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}/{id}:
   *   put:
   *     summary: Replace the fields of a record
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *       - { in: path, name: id, required: true, schema: { type: string } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               data: { description: 'JSON object, or JSON object text' }
   *     responses:
   *       200:
   *         description: The stored record
   *       404:
   *         description: No record with this id
   */
  api.put('/:schema/:collection/:id', async (req: AuthenticatedRequest, res) => {
    const id = req.params['id'] ?? '';
    try {
      const input = recordFromBody(req.body);
      if (input === undefined) {
        res.status(400).json({ error: 'invalid request body' });
        return;
      }
      const record = await store.update(req.params['schema'] ?? '', req.params['collection'] ?? '', id, input);
      res.json(addTokenToResponse(req, { message: `Record ${id} updated`, record }));
    } catch (error) {
      sendApiError(res, error, 'Update record');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}/{id}:
   *   delete:
   *     summary: Delete every record with this id
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *       - { in: path, name: id, required: true, schema: { type: string } }
   *     responses:
   *       200:
   *         description: Deleted
   *       404:
   *         description: No record with this id
   */
  api.delete('/:schema/:collection/:id', async (req: AuthenticatedRequest, res) => {
    const id = req.params['id'] ?? '';
    try {
      const removed = await store.delete(req.params['schema'] ?? '', req.params['collection'] ?? '', id);
      res.json(addTokenToResponse(req, { message: `Record ${id} deleted`, removed }));
    } catch (error) {
      sendApiError(res, error, 'Delete record');
    }
  });

  /**
   * @swagger
   * /v1/{schema}/{collection}:
   *   delete:
   *     summary: Drop a collection and its key
   *     parameters:
   *       - { in: path, name: schema, required: true, schema: { type: string } }
   *       - { in: path, name: collection, required: true, schema: { type: string } }
   *     responses:
   *       200:
   *         description: Dropped
   *       404:
   *         description: The collection does not exist
   */
  api.delete('/:schema/:collection', async (req: AuthenticatedRequest, res) => {
    const collection = req.params['collection'] ?? '';
    try {
      await store.drop(req.params['schema'] ?? '', collection);
      res.json(addTokenToResponse(req, { message: `Collection ${collection} dropped` }));
    } catch (error) {
      sendApiError(res, error, 'Drop collection');
    }
  });

  app.use('/v1', api);

  // =====================
  // Web UI
  // =====================

  async function sendIndexPage(res: Response, schemaName: string, notice: PageNotice, status = 200): Promise<void> {
    let collections: string[] = [];
    let pageStatus = status;
    let pageNotice = notice;
    try {
      collections = await store.list(schemaName);
    } catch (error) {
      pageStatus = status === 200 ? statusFor(error) : status;
      pageNotice = { ...notice, error: notice.error ?? getErrorMessage(error) };
    }
    res.status(pageStatus).type('html').send(renderIndexPage({ schemaName, collections, ...pageNotice }));
  }

  async function sendCollectionPage(
    res: Response,
    schemaName: string,
    collectionName: string,
    notice: PageNotice,
    status = 200,
  ): Promise<void> {
    let records: JsonObject[] = [];
    let pageStatus = status;
    let pageNotice = notice;
    try {
      records = await store.load(schemaName, collectionName);
    } catch (error) {
      pageStatus = status === 200 ? statusFor(error) : status;
      pageNotice = { ...notice, error: notice.error ?? getErrorMessage(error) };
    }
    res
      .status(pageStatus)
      .type('html')
      .send(renderCollectionPage({ schemaName, collectionName, records, ...pageNotice }));
  }

  app.get('/', async (_req, res) => {
    await sendIndexPage(res, config.schemaName, {});
  });

  app.get('/collections/:schema/:collection', async (req, res) => {
    await sendCollectionPage(res, req.params['schema'] ?? '', req.params['collection'] ?? '', {});
  });

  app.post('/web/create', async (req, res) => {
    const body: unknown = req.body;
    const collectionName = formField(body, 'collection_name');
    const data = formField(body, 'data');
    if (collectionName === '') {
      await sendIndexPage(res, config.schemaName, { error: 'Collection name is required' }, 400);
      return;
    }
    try {
      await store.create(config.schemaName, collectionName, data === '' ? undefined : data);
    } catch (error) {
      await sendIndexPage(res, config.schemaName, { error: getErrorMessage(error) }, statusFor(error));
      return;
    }
    await sendIndexPage(res, config.schemaName, { message: `Collection ${collectionName} created` });
  });

  app.post('/web/insert', async (req, res) => {
    const body: unknown = req.body;
    const schemaName = formField(body, 'schema_name');
    const collectionName = formField(body, 'collection_name');
    const data = formField(body, 'data');
    if (schemaName === '' || collectionName === '' || data === '') {
      const error = 'Collection name, schema name, and data are required';
      await sendCollectionPage(res, schemaName, collectionName, { error }, 400);
      return;
    }
    try {
      await store.insert(schemaName, collectionName, data);
    } catch (error) {
      await sendCollectionPage(res, schemaName, collectionName, { error: getErrorMessage(error) }, statusFor(error));
      return;
    }
    await sendCollectionPage(res, schemaName, collectionName, { message: 'Record inserted' });
  });

  app.post('/web/edit', async (req, res) => {
    const body: unknown = req.body;
    const schemaName = formField(body, 'schema_name');
    const collectionName = formField(body, 'collection_name');
    const id = formField(body, 'id');
    const data = formField(body, 'data');
    if (schemaName === '' || collectionName === '' || id === '' || data === '') {
      const error = 'Collection name, schema name, ID, and data are required';
      await sendCollectionPage(res, schemaName, collectionName, { error }, 400);
      return;
    }
    try {
      await store.update(schemaName, collectionName, id, data);
    } catch (error) {
      await sendCollectionPage(res, schemaName, collectionName, { error: getErrorMessage(error) }, statusFor(error));
      return;
    }
    await sendCollectionPage(res, schemaName, collectionName, { message: `Record ${id} updated` });
  });

  app.post('/web/delete', async (req, res) => {
    const body: unknown = req.body;
    const schemaName = formField(body, 'schema_name');
    const collectionName = formField(body, 'collection_name');
    const id = formField(body, 'id');
    if (schemaName === '' || collectionName === '' || id === '') {
      const error = 'Collection name, schema name, and ID are required';
      await sendCollectionPage(res, schemaName, collectionName, { error }, 400);
      return;
    }
    try {
      await store.delete(schemaName, collectionName, id);
    } catch (error) {
      await sendCollectionPage(res, schemaName, collectionName, { error: getErrorMessage(error) }, statusFor(error));
      return;
    }
    await sendCollectionPage(res, schemaName, collectionName, { message: `Record ${id} deleted` });
  });

  app.post('/web/drop', async (req, res) => {
    const body: unknown = req.body;
    const schemaName = formField(body, 'schema_name');
    const collectionName = formField(body, 'collection_name');
    if (schemaName === '' || collectionName === '') {
      const error = 'Collection name and schema name are required';
      await sendCollectionPage(res, schemaName, collectionName, { error }, 400);
      return;
    }
    try {
      await store.drop(schemaName, collectionName);
    } catch (error) {
      await sendCollectionPage(res, schemaName, collectionName, { error: getErrorMessage(error) }, statusFor(error));
      return;
    }
    await sendIndexPage(res, schemaName, { message: `Collection ${collectionName} dropped` });
  });

  return app;
}

/**
 * Ensures the default schema, builds the store and listens on the configured host and port.
 */
export async function startServer(config: LockerConfig): Promise<Server> {
  const port = Number(config.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port "${config.port}"`);
  }

  const namespace = new Namespace({ rootDir: config.dataDir, defaultSchema: config.schemaName });
  await namespace.ensureSchema('');
  const store = new CollectionStore(namespace, { lockCollections: true });
  const authenticator = createAuthenticator({
    secret: resolveJwtSecret(),
    username: config.username,
    password: config.password,
  });
  const app = createApp({ store, config, authenticator });

  return new Promise((resolve, reject) => {
    const server = app.listen(port, config.host, () => {
      console.log(`lockerdb daemon listening at http://${config.host}:${port}`);
      console.log(`Swagger UI available at http://${config.host}:${port}/api-docs`);
      console.log(`Storing collections under ${config.dataDir}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
