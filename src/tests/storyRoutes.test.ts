import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app.js';
import { GENERATION_DENIED_MESSAGE } from '../services/permissionGate.js';
import { generateToken } from '../utils/tokenGenerator.js';
import { FakeLanguageModel, chapterTitleOf, isSummaryPrompt, titleResponder } from './support/fakeLanguageModel.js';
import { HEBREW_PERSON, Harness, OTHER_PERSON, PERSON, UNENTITLED, createHarness } from './support/harness.js';

const SECRET = 'test-secret';
const ADMIN = 'admin-1';

const bearer = (personId: string) => `Bearer ${generateToken(personId, SECRET)}`;

describe('HTTP API', () => {
    let harness: Harness;
    let app: Express;

    const build = (model?: FakeLanguageModel) => {
        harness = createHarness({ model, allowed: [PERSON, OTHER_PERSON, ADMIN] });
        app = createApp(harness.services, { jwtSecret: SECRET, adminPersonIds: [ADMIN] });
    };

    beforeEach(() => build());

    describe('authentication', () => {
        it('rejects requests without a token', async () => {
            const res = await request(app).post('/api/story/chapter').send({ chapterId: 'c1' });

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: 'Not authorized - No token', code: 'UNAUTHORIZED' });
        });

        it('rejects a token signed with another secret', async () => {
            const res = await request(app)
                .get('/api/story/book')
                .set('Authorization', `Bearer ${generateToken(PERSON, 'other-secret')}`);

            expect(res.status).toBe(401);
            expect(res.body.error).toBe('Not authorized - Invalid token');
        });

        it('accepts the token from the cookie', async () => {
            const res = await request(app)
                .get('/api/story/chapter/c1')
                .set('Cookie', `token=${generateToken(PERSON, SECRET)}`);

            expect(res.status).toBe(200);
            expect(res.text).toBe('null');
        });
    });

    describe('chapter synthesis', () => {
        it('generates once, then serves the stored narrative', async () => {
            const first = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(PERSON))
                .send({ personId: PERSON, chapterId: 'c1', styleGuide: 'Warm' });
            const second = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(PERSON))
                .send({ chapterId: 'c1' });

            expect(first.status).toBe(200);
            expect(first.body).toMatchObject({
                chapterId: 'c1',
                narrative: 'Narrative of Childhood.',
                summary: 'facts from Childhood',
                cached: false
            });
            expect(second.body).toMatchObject({ narrative: 'Narrative of Childhood.', cached: true });
            expect(harness.model.chapterPrompts).toHaveLength(1);

            const stored = await request(app).get('/api/story/chapter/c1').set('Authorization', bearer(PERSON));
            expect(stored.body).toMatchObject({ chapterId: 'c1', narrative: 'Narrative of Childhood.', styleGuide: 'Warm' });
        });

        it('does not let a caller generate for someone else', async () => {
            const res = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(PERSON))
                .send({ personId: OTHER_PERSON, chapterId: 'c1' });

            expect(res.status).toBe(403);
            expect(res.body.error).toBe('You can only access your own story');
        });

        it('answers 403 for a person without LLM access', async () => {
            const res = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(UNENTITLED))
                .send({ chapterId: 'c1' });

            expect(res.status).toBe(403);
            expect(res.body).toEqual({ error: GENERATION_DENIED_MESSAGE, code: 'FORBIDDEN' });
            expect(harness.model.calls).toHaveLength(0);
        });

        it('validates the body', async () => {
            const res = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(PERSON))
                .send({ regenerate: 'yes' });

            expect(res.status).toBe(400);
            expect(res.body.code).toBe('VALIDATION_FAILED');
            expect(Object.keys(res.body.details.issues).sort()).toEqual(['chapterId', 'regenerate']);
        });

        it('reports a model failure as 502 GENERATION_FAILED', async () => {
            build(new FakeLanguageModel(() => ''));

            const res = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(PERSON))
                .send({ chapterId: 'c2' });

            expect(res.status).toBe(502);
            expect(res.body.code).toBe('GENERATION_FAILED');
            expect(res.body.error).toBe('Language model returned an empty chapter narrative');
        });

        it('answers 404 for an unknown chapter', async () => {
            const res = await request(app).get('/api/story/chapter/zzz').set('Authorization', bearer(PERSON));

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('Chapter zzz not found');
        });
    });

    describe('book compilation', () => {
        it('compiles and then serves the book', async () => {
            const before = await request(app).get('/api/story/book').set('Authorization', bearer(PERSON));
            expect(before.status).toBe(404);

            const compiled = await request(app)
                .post('/api/story/compile')
                .set('Authorization', bearer(PERSON))
                .send({ styleGuide: 'Gentle' });

            expect(compiled.status).toBe(200);
            expect(compiled.body).toMatchObject({ compiled: true, chaptersUsed: 3 });
            expect(compiled.body.book.startsWith('## Childhood\n\nNarrative of Childhood.')).toBe(true);

            const book = await request(app).get('/api/story/book').set('Authorization', bearer(PERSON));
            expect(book.status).toBe(200);
            expect(book.body).toMatchObject({
                personId: PERSON,
                book: compiled.body.book,
                styleGuide: 'Gentle',
                chaptersUsed: 3
            });
        });

        it('reports a failed chapter as 502 and names it', async () => {
            build(new FakeLanguageModel((prompt, call) =>
                !isSummaryPrompt(prompt) && chapterTitleOf(prompt) === 'Later Years'
                    ? Promise.reject(new Error('overloaded'))
                    : titleResponder(prompt, call)
            ));

            const res = await request(app).post('/api/story/compile').set('Authorization', bearer(PERSON)).send({});

            expect(res.status).toBe(502);
            expect(res.body.code).toBe('PARTIAL_GENERATION_FAILED');
            expect(res.body.details.chapterId).toBe('c3');
            expect(harness.narratives.books.size).toBe(0);
        });
    });

    describe('questionnaire', () => {
        it('lists chapters in order and their questions', async () => {
            const chapters = await request(app).get('/api/chapters');
            const questions = await request(app).get('/api/chapters/c1/questions');

            expect(chapters.body.map((chapter: { id: string }) => chapter.id)).toEqual(['c1', 'c2', 'c3']);
            expect(questions.body.map((question: { id: string }) => question.id)).toEqual(['c1-01', 'c1-02']);
        });

        it('upserts answers and returns them aggregated', async () => {
            const created = await request(app)
                .put('/api/answers')
                .set('Authorization', bearer(PERSON))
                .send({ chapterId: 'c1', questionId: 'c1-01', text: 'Haifa' });
            const updated = await request(app)
                .put('/api/answers')
                .set('Authorization', bearer(PERSON))
                .send({ chapterId: 'c1', questionId: 'c1-01', text: 'Haifa, Israel' });

            expect(created.status).toBe(201);
            expect(updated.status).toBe(200);
            expect(updated.body.updated).toBe(true);

            const answers = await request(app).get('/api/answers?chapterId=c1').set('Authorization', bearer(PERSON));
            expect(answers.body.entries).toEqual([
                { questionId: 'c1-01', prompt: 'Where were you born?', answer: 'Haifa, Israel' },
                { questionId: 'c1-02', prompt: 'Who raised you?', answer: '' }
            ]);
        });

        it('rejects an answer to a question outside the chapter', async () => {
            const res = await request(app)
                .put('/api/answers')
                .set('Authorization', bearer(PERSON))
                .send({ chapterId: 'c1', questionId: 'c2-01', text: 'Baker' });

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('Question c2-01 not found in chapter c1');
        });
    });

    describe('questionnaire language', () => {
        const ids = (body: Array<{ id: string }>) => body.map(item => item.id);

        it('lists chapters in the requested, then the preferred, then the default language', async () => {
            const anonymous = await request(app).get('/api/chapters');
            const requested = await request(app).get('/api/chapters?language=he');
            const preferred = await request(app).get('/api/chapters').set('Authorization', bearer(HEBREW_PERSON));
            const overridden = await request(app)
                .get('/api/chapters?language=en')
                .set('Authorization', bearer(HEBREW_PERSON));

            expect(ids(anonymous.body)).toEqual(['c1', 'c2', 'c3']);
            expect(ids(requested.body)).toEqual(['1-he', '2-he']);
            expect(ids(preferred.body)).toEqual(['1-he', '2-he']);
            expect(ids(overridden.body)).toEqual(['c1', 'c2', 'c3']);
        });

        it('still rejects a bad token on the chapter listing', async () => {
            const res = await request(app)
                .get('/api/chapters')
                .set('Authorization', `Bearer ${generateToken(PERSON, 'other-secret')}`);

            expect(res.status).toBe(401);
        });

        it('stores the caller\'s preference and applies it', async () => {
            const saved = await request(app)
                .put('/api/profile/language')
                .set('Authorization', bearer(PERSON))
                .send({ language: 'he' });
            const read = await request(app).get('/api/profile/language').set('Authorization', bearer(PERSON));
            const chapters = await request(app).get('/api/chapters').set('Authorization', bearer(PERSON));

            expect(saved.status).toBe(200);
            expect(saved.body).toEqual({ personId: PERSON, language: 'he' });
            expect(read.body).toEqual({ personId: PERSON, language: 'he' });
            expect(ids(chapters.body)).toEqual(['1-he', '2-he']);
        });

        it('reports the default language before a preference is stored', async () => {
            const res = await request(app).get('/api/profile/language').set('Authorization', bearer(PERSON));

            expect(res.body).toEqual({ personId: PERSON, language: 'en' });
        });

        it('rejects an unsupported language', async () => {
            const saved = await request(app)
                .put('/api/profile/language')
                .set('Authorization', bearer(PERSON))
                .send({ language: 'fr' });
            const listed = await request(app).get('/api/chapters?language=fr');

            expect(saved.status).toBe(400);
            expect(saved.body.code).toBe('VALIDATION_FAILED');
            expect(listed.status).toBe(400);
        });

        it('resolves chapter numbers in the caller\'s language for questions and answers', async () => {
            const questions = await request(app)
                .get('/api/chapters/1/questions')
                .set('Authorization', bearer(HEBREW_PERSON));
            const saved = await request(app)
                .put('/api/answers')
                .set('Authorization', bearer(HEBREW_PERSON))
                .send({ chapterId: '1', questionId: '1-he-01', text: 'חיפה' });

            expect(ids(questions.body)).toEqual(['1-he-01']);
            expect(saved.status).toBe(201);
            expect(saved.body.answer).toEqual({
                personId: HEBREW_PERSON,
                chapterId: '1-he',
                questionId: '1-he-01',
                text: 'חיפה'
            });
        });
    });

    describe('admin', () => {
        it('only lets administrators change LLM access', async () => {
            const res = await request(app)
                .post('/api/admin/llm-permission')
                .set('Authorization', bearer(PERSON))
                .send({ personId: UNENTITLED, canUseLlm: true });

            expect(res.status).toBe(403);
        });

        it('grants access so the person can generate', async () => {
            const granted = await request(app)
                .post('/api/admin/llm-permission')
                .set('Authorization', bearer(ADMIN))
                .send({ personId: UNENTITLED, canUseLlm: true });

            expect(granted.status).toBe(200);
            expect(granted.body).toEqual({
                message: 'LLM permission granted successfully',
                user: { personId: UNENTITLED, canUseLlm: true }
            });

            const res = await request(app)
                .post('/api/story/chapter')
                .set('Authorization', bearer(UNENTITLED))
                .send({ chapterId: 'c1' });
            expect(res.status).toBe(200);
        });

        it('answers 404 for an unknown person', async () => {
            const res = await request(app)
                .post('/api/admin/llm-permission')
                .set('Authorization', bearer(ADMIN))
                .send({ personId: 'nobody', canUseLlm: true });

            expect(res.status).toBe(404);
        });
    });

    it('answers 400 for malformed JSON', async () => {
        const res = await request(app)
            .post('/api/story/compile')
            .set('Authorization', bearer(PERSON))
            .set('Content-Type', 'application/json')
            .send('{"styleGuide":');

        expect(res.status).toBe(400);
        expect(res.body.code).toBe('VALIDATION_FAILED');
    });

    it('reports health without a token', async () => {
        const res = await request(app).get('/api/health');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: 'ok' });
    });

    it('answers 413 for a body over the size limit', async () => {
        const res = await request(app)
            .post('/api/story/compile')
            .set('Authorization', bearer(PERSON))
            .send({ styleGuide: 'x'.repeat(1_100_000) });

        expect(res.status).toBe(413);
        expect(res.body).toEqual({ error: 'request entity too large', code: 'REQUEST_REJECTED' });
        expect(harness.model.calls).toHaveLength(0);
    });

    it('answers 404 for unknown API routes', async () => {
        const res = await request(app).get('/api/unknown');

        expect(res.status).toBe(404);
        expect(res.body.code).toBe('NOT_FOUND');
    });
});
