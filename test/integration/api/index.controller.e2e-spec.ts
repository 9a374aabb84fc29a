import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../../../src/app.module';
import { createTestIndex, setupTestApp } from '../../utils/test-helpers';

describe('IndexController (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await setupTestApp([AppModule]);
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/indices', () => {
    it('should create an index from a docs file', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'from-file', docsFile: 'docs.txt' })
        .expect(201);

      expect(res.body).toMatchObject({
        name: 'from-file',
        documentCount: 3,
        keywordCount: 5,
        stopwordCount: 10,
      });
      expect(typeof res.body.createdAt).toBe('string');
    });

    it('should create an index from inline documents', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'inline', documents: ['gamma.txt', 'empty.txt'] })
        .expect(201);

      expect(res.body).toMatchObject({ name: 'inline', documentCount: 2, keywordCount: 2 });
    });

    it('should not allow duplicate index names', async () => {
      await createTestIndex(app, 'duplicate-index');

      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'duplicate-index', docsFile: 'docs.txt' })
        .expect(409);

      expect(res.body.message).toMatch(/already exists/i);
    });

    it('should reject an invalid index name', async () => {
      await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'Bad Name', docsFile: 'docs.txt' })
        .expect(400);
    });

    it('should reject a request with both document sources', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'both', documents: ['alpha.txt'], docsFile: 'docs.txt' })
        .expect(400);

      expect(res.body.message).toBe('Exactly one of documents or docsFile must be provided');
    });

    it('should reject a request without documents', async () => {
      await request(app.getHttpServer()).post('/api/indices').send({ name: 'none' }).expect(400);
    });

    it('should reject a null document source', async () => {
      await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'null-file', docsFile: null })
        .expect(400);
      await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'null-documents', documents: null })
        .expect(400);
    });

    it('should accept a null alongside the other document source', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'null-alongside', documents: null, docsFile: 'docs.txt' })
        .expect(201);

      expect(res.body).toMatchObject({ name: 'null-alongside', documentCount: 3 });
    });

    it('should return 404 for a missing document', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'missing', documents: ['alpha.txt', 'missing.txt'] })
        .expect(404);

      expect(res.body.message).toBe('Document missing.txt not found');

      await request(app.getHttpServer()).get('/api/indices/missing').expect(404);
    });

    it('should return 404 for a missing stop-word file', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'no-stopwords', docsFile: 'docs.txt', stopwordsFile: 'missing.txt' })
        .expect(404);

      expect(res.body.message).toBe('Stop-word file missing.txt not found');
    });

    it('should not read files outside the corpus', async () => {
      await request(app.getHttpServer())
        .post('/api/indices')
        .send({ name: 'escape', documents: ['../jest-setup.ts'] })
        .expect(404);
    });
  });

  describe('GET /api/indices', () => {
    it('should list created indices', async () => {
      await createTestIndex(app, 'listed');

      const res = await request(app.getHttpServer()).get('/api/indices').expect(200);

      expect(res.body.total).toBe(res.body.indices.length);
      expect(res.body.indices.map((index: { name: string }) => index.name)).toContain('listed');
    });
  });

  describe('GET /api/indices/:index', () => {
    it('should return index details', async () => {
      await createTestIndex(app, 'details');

      const res = await request(app.getHttpServer()).get('/api/indices/details').expect(200);

      expect(res.body).toMatchObject({ name: 'details', documentCount: 3, keywordCount: 5 });
    });

    it('should return 404 for an unknown index', async () => {
      await request(app.getHttpServer()).get('/api/indices/unknown').expect(404);
    });
  });

  describe('GET /api/indices/:index/keywords/:keyword', () => {
    beforeAll(async () => {
      await createTestIndex(app, 'postings');
    });

    it('should return the posting list by descending frequency', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/indices/postings/keywords/Tree')
        .expect(200);

      expect(res.body).toEqual({
        keyword: 'tree',
        postings: [
          { document: 'alpha.txt', frequency: 4 },
          { document: 'gamma.txt', frequency: 2 },
          { document: 'beta.txt', frequency: 1 },
        ],
      });
    });

    it('should return 404 for a stop word', async () => {
      await request(app.getHttpServer()).get('/api/indices/postings/keywords/the').expect(404);
    });
  });

  describe('DELETE /api/indices/:index', () => {
    it('should delete an index', async () => {
      await createTestIndex(app, 'to-delete');

      await request(app.getHttpServer()).delete('/api/indices/to-delete').expect(204);
      await request(app.getHttpServer()).get('/api/indices/to-delete').expect(404);
    });

    it('should return 404 for an unknown index', async () => {
      await request(app.getHttpServer()).delete('/api/indices/unknown').expect(404);
    });
  });
});
