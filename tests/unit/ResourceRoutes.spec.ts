import { describe, it, before, beforeEach } from 'node:test';
import assert from 'node:assert';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../services/api/src/app.js';
import { TokenVerifier } from '../../libs/auth/tokenVerifier.js';
import { AllowAllPolicy, RoleBasedPolicy } from '../../libs/auth/policy.js';
import type { PermissionPolicy } from '../../libs/auth/policy.js';
import { buildResourceDefinitions } from '../../libs/resource/registry.js';
import { createResourceServices } from '../../libs/resource/resourceService.js';
import { MemoryDocumentStore } from '../../libs/store/memoryStore.js';
import type { DocumentBody } from '../../libs/store/documentStore.js';
import { idAt, sequentialIds } from '../helpers/fixtures.js';

const verifier = new TokenVerifier({
    jwtSecret: 'test-secret',
    issuer: 'test-issuer',
    audience: 'test-audience'
});

class FailingStore extends MemoryDocumentStore {
    async create(_collection: string, _doc: DocumentBody): Promise<string> {
        throw new Error('connection reset by peer');
    }
}

function buildApp(options: { store?: MemoryDocumentStore; policy?: PermissionPolicy; enableLogin?: boolean } = {}): Express {
    const services = createResourceServices(
        buildResourceDefinitions(),
        options.store ?? new MemoryDocumentStore(sequentialIds()),
        options.policy ?? new AllowAllPolicy()
    );
    return createApp({ services, verifier, enableLogin: options.enableLogin ?? false });
}

describe('Resource routes', () => {
    let app: Express;
    let auth: string;

    before(async () => {
        auth = `Bearer ${await verifier.issue('user-1', ['developer'])}`;
    });

    beforeEach(() => {
        app = buildApp();
    });

    it('should answer health checks without a token', async () => {
        const res = await request(app).get('/health');
        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(res.body, { status: 'ok' });
    });

    describe('authentication', () => {
        it('should reject a request without a bearer token', async () => {
            const res = await request(app).get('/api/grade');
            assert.strictEqual(res.status, 401);
            assert.deepStrictEqual(res.body, { error: 'Missing bearer token' });
        });

        it('should reject an invalid token', async () => {
            const res = await request(app).get('/api/grade').set('Authorization', 'Bearer not.a.token');
            assert.strictEqual(res.status, 401);
            assert.deepStrictEqual(res.body, { error: 'Invalid token' });
        });
    });

    describe('create and read', () => {
        it('should create a document stamped with the request breadcrumb', async () => {
            const res = await request(app)
                .post('/api/testrun')
                .set('Authorization', auth)
                .set('X-Correlation-Id', 'corr-42')
                .send({ _id: 'chosen-by-client', name: 'nightly', created: { by_user: 'mallory' } });

            assert.strictEqual(res.status, 201);
            assert.strictEqual(res.headers['x-correlation-id'], 'corr-42');
            assert.strictEqual(res.body._id, idAt(1));
            assert.strictEqual(res.body.name, 'nightly');
            assert.strictEqual(res.body.created.by_user, 'user-1');
            assert.strictEqual(res.body.created.correlation_id, 'corr-42');
            assert.strictEqual(typeof res.body.created.from_ip, 'string');
            assert.ok(!Number.isNaN(Date.parse(res.body.created.at_time)));

            const fetched = await request(app).get(`/api/testrun/${idAt(1)}`).set('Authorization', auth);
            assert.strictEqual(fetched.status, 200);
            assert.deepStrictEqual(fetched.body, res.body);
        });

        it('should return 404 for an unknown or malformed id', async () => {
            const unknown = await request(app).get(`/api/grade/${idAt(9)}`).set('Authorization', auth);
            assert.strictEqual(unknown.status, 404);
            assert.deepStrictEqual(unknown.body, { error: `Grade ${idAt(9)} not found` });

            const malformed = await request(app).get('/api/grade/xyz').set('Authorization', auth);
            assert.strictEqual(malformed.status, 404);
            assert.deepStrictEqual(malformed.body, { error: 'Grade xyz not found' });
        });

        it('should reject a body that is not an object', async () => {
            const res = await request(app).post('/api/grade').set('Authorization', auth).send([1, 2]);
            assert.strictEqual(res.status, 400);
            assert.deepStrictEqual(res.body, {
                error: 'Expected object, received array',
                details: [{ field: '', message: 'Expected object, received array' }]
            });
        });

        it('should reject malformed JSON', async () => {
            const res = await request(app)
                .post('/api/grade')
                .set('Authorization', auth)
                .set('Content-Type', 'application/json')
                .send('{"name":');
            assert.strictEqual(res.status, 400);
            assert.deepStrictEqual(res.body, { error: 'Malformed JSON body' });
        });
    });

    describe('listing', () => {
        beforeEach(async () => {
            for (const name of ['a', 'b', 'c', 'd', 'e']) {
                await request(app).post('/api/grade').set('Authorization', auth).send({ name }).expect(201);
            }
        });

        it('should scroll through a..e two at a time', async () => {
            const first = await request(app).get('/api/grade?limit=2').set('Authorization', auth);
            assert.strictEqual(first.status, 200);
            assert.deepStrictEqual(first.body.items.map((item: { name: string }) => item.name), ['a', 'b']);
            assert.strictEqual(first.body.has_more, true);
            assert.strictEqual(first.body.next_cursor, idAt(2));
            assert.strictEqual(first.body.limit, 2);

            const second = await request(app)
                .get('/api/grade')
                .query({ limit: 2, after_id: first.body.next_cursor })
                .set('Authorization', auth);
            assert.deepStrictEqual(second.body.items.map((item: { name: string }) => item.name), ['c', 'd']);
            assert.strictEqual(second.body.next_cursor, idAt(4));

            const third = await request(app)
                .get('/api/grade')
                .query({ limit: 2, after_id: second.body.next_cursor })
                .set('Authorization', auth);
            assert.deepStrictEqual(third.body.items.map((item: { name: string }) => item.name), ['e']);
            assert.strictEqual(third.body.has_more, false);
            assert.strictEqual(third.body.next_cursor, null);
        });

        it('should sort descending and filter by name', async () => {
            const res = await request(app).get('/api/grade?order=DESC&limit=3').set('Authorization', auth);
            assert.deepStrictEqual(res.body.items.map((item: { name: string }) => item.name), ['e', 'd', 'c']);

            const filtered = await request(app).get('/api/grade?name=C').set('Authorization', auth);
            assert.deepStrictEqual(filtered.body.items.map((item: { name: string }) => item.name), ['c']);
        });

        it('should use the first value of a repeated parameter', async () => {
            const res = await request(app).get('/api/grade?limit=1&limit=50').set('Authorization', auth);
            assert.strictEqual(res.body.limit, 1);
            assert.strictEqual(res.body.items.length, 1);
        });

        it('should clamp the limit', async () => {
            const res = await request(app).get('/api/grade?limit=500').set('Authorization', auth);
            assert.strictEqual(res.body.limit, 100);
            assert.strictEqual(res.body.items.length, 5);
        });

        it('should reject a sort field outside the allow-list', async () => {
            const res = await request(app).get('/api/grade?sort_by=status').set('Authorization', auth);
            assert.strictEqual(res.status, 400);
            assert.deepStrictEqual(res.body, {
                error: "Invalid sort_by field 'status'. Allowed fields: name, description, created.at_time",
                details: [{ field: 'sort_by', message: "'status' is not an allowed sort field" }]
            });
        });

        it('should reject a non-numeric limit and a bad order', async () => {
            const limit = await request(app).get('/api/grade?limit=ten').set('Authorization', auth);
            assert.strictEqual(limit.status, 400);
            assert.deepStrictEqual(limit.body, {
                error: 'limit: must be an integer',
                details: [{ field: 'limit', message: 'must be an integer' }]
            });

            const order = await request(app).get('/api/grade?order=random').set('Authorization', auth);
            assert.strictEqual(order.status, 400);
            assert.strictEqual(order.body.error, "order: must be 'asc' or 'desc'");
        });

        it('should reject a malformed cursor', async () => {
            const res = await request(app).get('/api/grade?after_id=page-2').set('Authorization', auth);
            assert.strictEqual(res.status, 400);
            assert.strictEqual(res.body.error, 'Invalid after_id cursor: "page-2"');
        });
    });

    describe('update', () => {
        it('should merge the patch and keep created', async () => {
            const created = await request(app)
                .post('/api/testcase')
                .set('Authorization', auth)
                .send({ name: 'login', status: 'draft', steps: 3 })
                .expect(201);

            const res = await request(app)
                .patch(`/api/testcase/${created.body._id}`)
                .set('Authorization', auth)
                .send({ status: 'ready', created: null });

            assert.strictEqual(res.status, 200);
            assert.deepStrictEqual(res.body, { ...created.body, status: 'ready' });
        });

        it('should return 404 when patching a missing document', async () => {
            const res = await request(app)
                .patch(`/api/testcase/${idAt(3)}`)
                .set('Authorization', auth)
                .send({ status: 'ready' });
            assert.strictEqual(res.status, 404);
            assert.deepStrictEqual(res.body, { error: `TestCase ${idAt(3)} not found` });
        });

        it('should not route operations a resource does not enable', async () => {
            const patch = await request(app).patch(`/api/grade/${idAt(1)}`).set('Authorization', auth).send({});
            assert.strictEqual(patch.status, 404);
            assert.deepStrictEqual(patch.body, { error: `Route PATCH /api/grade/${idAt(1)} not found` });

            const post = await request(app).post('/api/profile').set('Authorization', auth).send({ name: 'p' });
            assert.strictEqual(post.status, 404);
            assert.deepStrictEqual(post.body, { error: 'Route POST /api/profile not found' });
        });
    });

    describe('failures', () => {
        it('should return 403 when the policy denies', async () => {
            const guarded = buildApp({ policy: new RoleBasedPolicy({ '*': { read: ['*'] }, grade: { create: ['admin'] } }) });

            const res = await request(guarded).post('/api/grade').set('Authorization', auth).send({ name: 'x' });
            assert.strictEqual(res.status, 403);
            assert.deepStrictEqual(res.body, { error: 'Not permitted to create grade' });

            const list = await request(guarded).get('/api/grade').set('Authorization', auth);
            assert.strictEqual(list.status, 200);
        });

        it('should return a generic 500 with an incident id', async () => {
            const failing = buildApp({ store: new FailingStore() });

            const res = await request(failing).post('/api/grade').set('Authorization', auth).send({ name: 'x' });
            assert.strictEqual(res.status, 500);
            assert.deepStrictEqual(Object.keys(res.body).sort(), ['error', 'incident_id']);
            assert.strictEqual(res.body.error, 'Failed to create grade');
            assert.match(res.body.incident_id, /^[0-9a-f-]{36}$/);
        });
    });

    describe('development login', () => {
        it('should issue a usable token when enabled', async () => {
            const withLogin = buildApp({ enableLogin: true });

            const login = await request(withLogin).post('/dev-login').send({ subject: 'tester', roles: ['admin'] });
            assert.strictEqual(login.status, 200);
            assert.strictEqual(login.body.token_type, 'bearer');
            assert.strictEqual(login.body.expires_in, 3600);

            const res = await request(withLogin)
                .post('/api/grade')
                .set('Authorization', `Bearer ${login.body.access_token}`)
                .send({ name: 'A' });
            assert.strictEqual(res.status, 201);
            assert.strictEqual(res.body.created.by_user, 'tester');
        });

        it('should validate the login body', async () => {
            const withLogin = buildApp({ enableLogin: true });
            const res = await request(withLogin).post('/dev-login').send({ roles: ['admin'] });
            assert.strictEqual(res.status, 400);
            assert.strictEqual(res.body.error, 'subject: Required');
        });

        it('should not exist when disabled', async () => {
            const res = await request(app).post('/dev-login').send({ subject: 'tester' });
            assert.strictEqual(res.status, 404);
            assert.deepStrictEqual(res.body, { error: 'Route POST /dev-login not found' });
        });
    });
});
