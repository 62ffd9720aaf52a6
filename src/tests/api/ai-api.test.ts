import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createTestApp, sequence } from '../utils/test-helpers';

const PREDICTION_ID = '7d1f6c8e-3a52-4b7e-9c1d-2e4f5a6b7c8d';

describe('AI API', () => {
  describe('POST /api/v1/ai/predict', () => {
    it('should return a prediction', async () => {
      const { app } = createTestApp({ random: sequence([0.5]) });

      const response = await request(app)
        .post('/api/v1/ai/predict')
        .send({ text: 'Summarize this article' })
        .expect(200);

      expect(response.body.data.result).toBe('Processed: Summarize this article...');
      expect(response.body.data.predictionId).toBeDefined();
    });

    it('should fail with the drawn status when errors are simulated', async () => {
      const { app } = createTestApp({ random: sequence([0.2, 0.0]) });

      const response = await request(app)
        .post('/api/v1/ai/predict?simulate_error=True')
        .send({ text: 'Classify this text sample' })
        .expect(400);

      expect(response.body.error).toEqual({
        message: 'Simulated error with status code 400',
        statusCode: 400,
        errorCode: 'SIMULATED_ERROR',
      });
    });

    it('should reject an unparseable simulate_error flag', async () => {
      const { app } = createTestApp();

      const response = await request(app)
        .post('/api/v1/ai/predict?simulate_error=maybe')
        .send({ text: 'hello' })
        .expect(400);

      expect(response.body.error.errors[0].path).toBe('simulate_error');
    });

    it('should reject an empty text', async () => {
      const { app } = createTestApp();

      await request(app).post('/api/v1/ai/predict').send({ text: '' }).expect(400);
    });
  });

  describe('GET /api/v1/ai/predict/:predictionId', () => {
    it('should return the prediction', async () => {
      const { app } = createTestApp({ random: sequence([0.9]) });

      const response = await request(app)
        .get(`/api/v1/ai/predict/${PREDICTION_ID}?simulate_error=true`)
        .expect(200);

      expect(response.body.data).toMatchObject({
        predictionId: PREDICTION_ID,
        result: 'Cached prediction result',
        confidence: 0.95,
      });
    });

    it('should return 404 when a miss is simulated', async () => {
      const { app } = createTestApp({ random: sequence([0.1]) });

      const response = await request(app)
        .get(`/api/v1/ai/predict/${PREDICTION_ID}?simulate_error=1`)
        .expect(404);

      expect(response.body.error.message).toBe(`Prediction ${PREDICTION_ID} not found`);
    });
  });
});
