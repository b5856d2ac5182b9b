import request from 'supertest';
import express from 'express';
import { App } from '../../app';
import { Database } from '../../db/database';
import { PostService } from '../../services/post.service';
import { createTestDatabase, TestDatabase } from '../helpers/testDatabase';

const ISO_WITH_Z = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

let testDatabase: TestDatabase;
let database: Database;
let expressApp: express.Application;

beforeAll(async () => {
  testDatabase = await createTestDatabase();
  database = testDatabase.database;
  expressApp = new App(database).app;
});

beforeEach(() => {
  testDatabase.reset();
});

afterAll(async () => {
  await database.sequelize.close();
});

const countMappings = () => database.models.PostMapping.count();

describe('Post Endpoints - /posts', () => {
  const testPostPayload = {
    id: 'p1',
    user_id: 'u1',
    content: 'hello',
  };

  it('POST /posts/ - should publish a new post', async () => {
    const response = await request(expressApp).post('/posts/').send(testPostPayload);

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('published');
    expect(response.body.message).toBe('Post created successfully.');
    expect(response.body.data).toHaveLength(1);

    const [post] = response.body.data;
    expect(post).toEqual({
      id: 'p1',
      userId: 'u1',
      content: 'hello',
      imageUrl: null,
      userPostmapping: [],
      createdAt: expect.stringMatching(ISO_WITH_Z),
    });
  });

  it('POST /posts - should accept the path without a trailing slash and keep media_url', async () => {
    const response = await request(expressApp)
      .post('/posts')
      .send({ ...testPostPayload, media_url: 'https://cdn.test/cat.png' });

    expect(response.status).toBe(200);
    expect(response.body.data[0].imageUrl).toBe('https://cdn.test/cat.png');
  });

  it('POST /posts/ - should return 400 when the id is already taken and keep the original', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);
    await request(expressApp).post('/posts/response/').send({ post_id: 'p1', user_id: 'u2', comments: 'first!' });

    const response = await request(expressApp)
      .post('/posts/')
      .send({ ...testPostPayload, user_id: 'u9', content: 'overwrite attempt' });

    expect(response.status).toBe(400);
    expect(response.body.detail).toBe('Post with this ID already exists');

    const list = await request(expressApp).get('/posts/');
    expect(list.body.data).toHaveLength(1);
    expect(list.body.data[0].userId).toBe('u1');
    expect(list.body.data[0].content).toBe('hello');
    expect(list.body.data[0].userPostmapping).toHaveLength(1);
    expect(list.body.data[0].userPostmapping[0].comments).toBe('first!');
  });

  it('POST /posts/ - should return 422 when content is missing', async () => {
    const { content, ...incompletePayload } = testPostPayload;
    const response = await request(expressApp).post('/posts/').send(incompletePayload);

    expect(response.status).toBe(422);
    expect(response.body.detail).toBe('Validation failed');
    expect(response.body.errors).toEqual([
      { path: 'content', message: 'Required', code: 'invalid_type' },
    ]);
  });

  it('POST /posts/ - should return 422 when content is longer than 256 characters', async () => {
    const response = await request(expressApp)
      .post('/posts/')
      .send({ ...testPostPayload, content: 'x'.repeat(257) });

    expect(response.status).toBe(422);
    expect(response.body.errors[0].path).toBe('content');
    expect(response.body.errors[0].code).toBe('too_big');
  });

  it('POST /posts/ - should count content length in characters, not UTF-16 units', async () => {
    const response = await request(expressApp)
      .post('/posts/')
      .send({ ...testPostPayload, content: '😀'.repeat(200) });

    expect(response.status).toBe(200);
    expect(response.body.data[0].content).toBe('😀'.repeat(200));
  });

  it('POST /posts/ - should reject 257 emoji with too_big', async () => {
    const response = await request(expressApp)
      .post('/posts/')
      .send({ ...testPostPayload, content: '😀'.repeat(257) });

    expect(response.status).toBe(422);
    expect(response.body.errors).toEqual([
      { path: 'content', message: 'String must contain at most 256 character(s)', code: 'too_big' },
    ]);
  });

  it('POST /posts/ - should accept content of exactly 256 characters', async () => {
    const response = await request(expressApp)
      .post('/posts/')
      .send({ ...testPostPayload, content: 'x'.repeat(256) });

    expect(response.status).toBe(200);
    expect(response.body.data[0].content).toHaveLength(256);
  });

  it('POST /posts/ - should store ids longer than 255 characters', async () => {
    const longId = 'p'.repeat(300);
    const longUser = 'u'.repeat(300);

    const created = await request(expressApp)
      .post('/posts/')
      .send({ id: longId, user_id: longUser, content: 'long ids' });
    expect(created.status).toBe(200);
    expect(created.body.data[0].id).toBe(longId);

    const responded = await request(expressApp)
      .post('/posts/response/')
      .send({ post_id: longId, user_id: longUser, comments: 'ok' });
    expect(responded.status).toBe(200);
    expect(responded.body.data[0].post_id).toBe(longId);
  });

  it('GET /posts/ - should return an empty list when nothing was published', async () => {
    const response = await request(expressApp).get('/posts/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'published',
      message: 'Posts fetched successfully.',
      data: [],
    });
  });

  it('GET /posts/ - should nest responses under their post', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);
    await request(expressApp).post('/posts/').send({ id: 'p2', user_id: 'u3', content: 'second' });
    await request(expressApp).post('/posts/response/').send({ post_id: 'p1', user_id: 'u2', liked: true });

    const response = await request(expressApp).get('/posts/');

    expect(response.status).toBe(200);
    expect(response.body.data).toHaveLength(2);
    const p1 = response.body.data.find((post: { id: string }) => post.id === 'p1');
    const p2 = response.body.data.find((post: { id: string }) => post.id === 'p2');
    expect(p1.userPostmapping).toEqual([
      { id: 1, post_id: 'p1', comments: null, like: 'true', dislike: false },
    ]);
    expect(p2.userPostmapping).toEqual([]);
  });

  it('POST /posts/response/ - should add a response to an existing post', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);

    const response = await request(expressApp)
      .post('/posts/response/')
      .send({ post_id: 'p1', user_id: 'u2', comments: 'nice', liked: true, disliked: true });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'published',
      message: 'User response added successfully.',
      data: [{ id: 1, post_id: 'p1', comments: 'nice', like: 'true', dislike: true }],
    });
  });

  it('POST /posts/response/ - should default liked and disliked to false', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);

    const response = await request(expressApp)
      .post('/posts/response/')
      .send({ post_id: 'p1', user_id: 'u2' });

    expect(response.status).toBe(200);
    expect(response.body.data[0]).toEqual({ id: 1, post_id: 'p1', comments: null, like: 'false', dislike: false });
  });

  it('POST /posts/response/ - should return 404 for an unknown post and persist nothing', async () => {
    const response = await request(expressApp)
      .post('/posts/response/')
      .send({ post_id: 'missing', user_id: 'u2', liked: true });

    expect(response.status).toBe(404);
    expect(response.body.detail).toBe('Post not found');
    expect(await countMappings()).toBe(0);
  });

  it('POST /posts/response/ - should return 422 when liked is not a boolean', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);

    const response = await request(expressApp)
      .post('/posts/response/')
      .send({ post_id: 'p1', user_id: 'u2', liked: 'yes' });

    expect(response.status).toBe(422);
    expect(response.body.errors[0].path).toBe('liked');
    expect(await countMappings()).toBe(0);
  });

  it('DELETE /posts/:postId - should delete the post together with its responses', async () => {
    await request(expressApp).post('/posts/').send(testPostPayload);
    await request(expressApp).post('/posts/response/').send({ post_id: 'p1', user_id: 'u2', liked: true });
    await request(expressApp).post('/posts/response/').send({ post_id: 'p1', user_id: 'u3', disliked: true });

    const response = await request(expressApp).delete('/posts/p1');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'deleted', message: 'Post deleted successfully.' });
    expect(await countMappings()).toBe(0);

    const list = await request(expressApp).get('/posts/');
    expect(list.body.data).toEqual([]);
  });

  it('DELETE /posts/:postId - should return 404 if the post does not exist', async () => {
    const response = await request(expressApp).delete('/posts/nope');

    expect(response.status).toBe(404);
    expect(response.body.detail).toBe('Post not found');
  });

  it('should run the publish, respond, list, delete flow end to end', async () => {
    const created = await request(expressApp).post('/posts/').send(testPostPayload);
    expect(created.body.data[0]).toMatchObject({ id: 'p1', userId: 'u1', content: 'hello', imageUrl: null, userPostmapping: [] });

    const responded = await request(expressApp).post('/posts/response/').send({ post_id: 'p1', user_id: 'u2', liked: true });
    expect(responded.body.data[0]).toMatchObject({ like: 'true', dislike: false });

    const listed = await request(expressApp).get('/posts/');
    expect(listed.body.data).toHaveLength(1);
    expect(listed.body.data[0].userPostmapping).toEqual([responded.body.data[0]]);

    await request(expressApp).delete('/posts/p1').expect(200);
    const afterDelete = await request(expressApp).get('/posts/');
    expect(afterDelete.body.data).toEqual([]);
  });
});

describe('Request plumbing', () => {
  it('should echo an incoming correlation id', async () => {
    const response = await request(expressApp)
      .get('/posts/')
      .set('X-Correlation-ID', 'corr-123');

    expect(response.headers['x-correlation-id']).toBe('corr-123');
  });

  it('should generate a correlation id and include it in error bodies', async () => {
    const response = await request(expressApp).delete('/posts/unknown');

    const generated = response.headers['x-correlation-id'];
    expect(generated).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(response.body.correlationId).toBe(generated);
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(expressApp).get('/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.detail).toBe('Not Found');
  });

  describe('internal errors', () => {
    const originalNodeEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalNodeEnv;
      jest.restoreAllMocks();
    });

    it('should answer 500 with a generic detail and no stack', async () => {
      jest.spyOn(PostService.prototype, 'listPosts').mockRejectedValueOnce(new Error('connection reset'));

      const response = await request(expressApp)
        .get('/posts/')
        .set('X-Correlation-ID', 'corr-500');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ detail: 'Internal server error', correlationId: 'corr-500' });
    });

    it('should include the stack in development', async () => {
      process.env.NODE_ENV = 'development';
      jest.spyOn(PostService.prototype, 'listPosts').mockRejectedValueOnce(new Error('connection reset'));

      const response = await request(expressApp).get('/posts/');

      expect(response.status).toBe(500);
      expect(response.body.detail).toBe('Internal server error');
      expect(response.body.stack).toMatch(/^Error: connection reset/);
    });
  });

  it('should reject malformed JSON with 400', async () => {
    const response = await request(expressApp)
      .post('/posts/')
      .set('Content-Type', 'application/json')
      .send('{"id": ');

    expect(response.status).toBe(400);
    expect(typeof response.body.detail).toBe('string');
  });
});
