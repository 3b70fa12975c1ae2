import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { InMemoryQueryExecutor } from './support/in-memory-query-executor';
import { storefrontSeed } from './support/fixtures';
import { createTestApp } from './support/test-app';

describe('Reviews and Q&A (e2e)', () => {
    let app: INestApplication;
    let executor: InMemoryQueryExecutor;

    beforeEach(async () => {
        executor = new InMemoryQueryExecutor(storefrontSeed());
        app = await createTestApp(executor);
    });

    afterEach(async () => {
        await app.close();
    });

    describe('reviews', () => {
        it('lists reviews of a product newest first', async () => {
            const res = await request(app.getHttpServer()).get('/products/1/reviews').expect(200);
            expect(res.body.body.data.map((review: { id: number }) => review.id)).toEqual([2, 1]);
        });

        it('answers 404 for reviews of a missing product', async () => {
            const res = await request(app.getHttpServer()).get('/products/999/reviews').expect(404);
            expect(res.body.body.message).toBe('Product not found');
        });

        it('creates a review', async () => {
            const res = await request(app.getHttpServer())
                .post('/products/2/reviews')
                .send({ user_name: 'mina', rating: 3, content: 'Decent grip' })
                .expect(201);

            expect(res.body.body.message).toBe('Review created');
            expect(res.body.body.data).toMatchObject({ id: 4, product_id: 2, user_name: 'mina', rating: 3 });
        });

        it('rejects a rating outside 1-5', async () => {
            await request(app.getHttpServer())
                .post('/products/2/reviews')
                .send({ user_name: 'mina', rating: 6, content: 'Too good' })
                .expect(400);
            expect(executor.rows('reviews')).toHaveLength(3);
        });

        it('updates a review and 404s on a missing one', async () => {
            const res = await request(app.getHttpServer()).patch('/reviews/2').send({ rating: 3 }).expect(200);
            expect(res.body.body.data).toMatchObject({ id: 2, rating: 3, content: 'Runs small' });

            const missing = await request(app.getHttpServer()).patch('/reviews/999').send({ rating: 3 }).expect(404);
            expect(missing.body.body.message).toBe('Review not found');
        });
    });

    describe('qa', () => {
        it('submits a question unanswered, then answers it', async () => {
            const asked = await request(app.getHttpServer())
                .post('/products/1/qa')
                .send({ user_name: 'alex', question: 'Does it run true to size?' })
                .expect(201);
            expect(asked.body.body.message).toBe('Question submitted');
            expect(asked.body.body.data).toMatchObject({ id: 2, answer: '', answered_at: null });

            const answered = await request(app.getHttpServer())
                .patch('/qa/2')
                .send({ answer: 'Yes, order your usual size.' })
                .expect(200);
            expect(answered.body.body.message).toBe('Q&A updated');
            expect(answered.body.body.data.answer).toBe('Yes, order your usual size.');
            expect(typeof answered.body.body.data.answered_at).toBe('string');

            const cleared = await request(app.getHttpServer()).patch('/qa/2').send({ answer: '' }).expect(200);
            expect(cleared.body.body.data.answered_at).toBeNull();
        });

        it('lists questions of a product newest first', async () => {
            await request(app.getHttpServer())
                .post('/products/1/qa')
                .send({ user_name: 'sam', question: 'Is there a wide fit?' })
                .expect(201);

            const res = await request(app.getHttpServer()).get('/products/1/qa').expect(200);
            expect(res.body.body.data.map((entry: { id: number }) => entry.id)).toEqual([2, 1]);
        });

        it('answers 404 for a missing entry or product', async () => {
            const res = await request(app.getHttpServer()).patch('/qa/999').send({ answer: 'n/a' }).expect(404);
            expect(res.body.body.message).toBe('Q&A entry not found');

            await request(app.getHttpServer())
                .post('/products/999/qa')
                .send({ user_name: 'sam', question: 'Anyone?' })
                .expect(404);
        });
    });
});
