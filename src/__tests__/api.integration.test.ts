import request from 'supertest';
import { Express } from 'express';
import path from 'path';
import sharp from 'sharp';
import { createApp } from '../index';

describe('API Integration Tests', () => {
  let app: Express;

  beforeAll(() => {
    app = createApp({ port: 0, nodeEnv: 'test', jsonLimit: '1mb', maxCanvasSize: 500, corsOrigins: [] });
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const smallClock = {
    width: 60,
    height: 40,
    elements: [
      { type: 'Face', properties: { color: 'ivory', border_width: 2 } },
      { type: 'Ticks', properties: {} },
      { type: 'Hands', properties: { time: '10:10:30' } },
    ],
  };

  describe('GET /api/health', () => {
    it('should report the server as running', async () => {
      const response = await request(app).get('/api/health').expect(200);

      expect(response.body).toEqual({ status: 'ok', message: 'Clock renderer is running' });
    });
  });

  describe('GET /api/clock/styles', () => {
    it('should list every preset', async () => {
      const response = await request(app).get('/api/clock/styles').expect(200);

      expect(response.body.styles.map((style: { name: string }) => style.name)).toEqual([
        'classic',
        'modern',
        'minimal',
        'roman',
        'midnight',
      ]);
    });
  });

  describe('POST /api/clock/render', () => {
    it('should render a configuration as PNG', async () => {
      const response = await request(app).post('/api/clock/render').send(smallClock).expect(200);

      expect(response.headers['content-type']).toBe('image/png');
      const metadata = await sharp(response.body).metadata();
      expect(metadata.format).toBe('png');
      expect(metadata.width).toBe(60);
      expect(metadata.height).toBe(40);
    });

    it('should honor the format query parameter', async () => {
      const response = await request(app).post('/api/clock/render?format=jpeg').send(smallClock).expect(200);

      expect(response.headers['content-type']).toBe('image/jpeg');
      expect((await sharp(response.body).metadata()).format).toBe('jpeg');
    });

    it('should reject unsupported formats', async () => {
      const response = await request(app).post('/api/clock/render?format=bmp').send(smallClock).expect(400);

      expect(response.body).toEqual({ error: 'Invalid configuration', message: 'Unsupported output format: bmp' });
    });

    it('should reject unknown element types', async () => {
      const response = await request(app)
        .post('/api/clock/render')
        .send({ width: 50, height: 50, elements: [{ type: 'Pendulum' }] })
        .expect(400);

      expect(response.body.message).toBe(
        'Unknown element type: Pendulum. Expected one of: Face, Ticks, Numerals, Overlay, Hands'
      );
    });

    it('should reject a configuration without dimensions', async () => {
      const response = await request(app).post('/api/clock/render').send({ elements: [] }).expect(400);

      expect(response.body.error).toBe('Invalid configuration');
    });

    it('should reject canvases over the size limit', async () => {
      const response = await request(app)
        .post('/api/clock/render')
        .send({ width: 501, height: 100 })
        .expect(400);

      expect(response.body.message).toBe('Canvas 501x100 exceeds the maximum of 500x500');
    });

    it('should reject oversized supersampling factors', async () => {
      const response = await request(app)
        .post('/api/clock/render')
        .send({ width: 50, height: 50, scale_factor: 9 })
        .expect(400);

      expect(response.body.message).toBe('scale_factor 9 exceeds the maximum of 8');
    });

    it('should report a missing face image with its path', async () => {
      const imagePath = path.join(__dirname, 'no-such-face.png');
      const response = await request(app)
        .post('/api/clock/render')
        .send({ width: 50, height: 50, elements: [{ type: 'Face', properties: { image_path: imagePath } }] })
        .expect(422);

      expect(response.body).toEqual({
        error: 'Missing resource',
        message: `Background image not found: ${imagePath}`,
        path: imagePath,
      });
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/clock/render')
        .set('Content-Type', 'application/json')
        .send('{"width": 50,')
        .expect(400);

      expect(response.body.error).toBe('Invalid JSON');
    });
  });

  describe('POST /api/clock/create', () => {
    it('should render a preset at the requested size', async () => {
      const response = await request(app)
        .post('/api/clock/create')
        .send({ time: '3:15:30', style: 'modern', width: 100, height: 100 })
        .expect(200);

      expect(response.headers['content-type']).toBe('image/png');
      const metadata = await sharp(response.body).metadata();
      expect(metadata.width).toBe(100);
      expect(metadata.height).toBe(100);
    });

    it('should reject unknown styles', async () => {
      const response = await request(app)
        .post('/api/clock/create')
        .send({ time: '3:15:30', style: 'baroque', width: 100, height: 100 })
        .expect(400);

      expect(response.body.message).toBe(
        "Style 'baroque' not recognized. Available styles: classic, modern, minimal, roman, midnight"
      );
    });

    it('should answer 400 for a style named after an object member', async () => {
      const response = await request(app)
        .post('/api/clock/create')
        .send({ time: '3:15:30', style: 'constructor' })
        .expect(400);

      expect(response.body.error).toBe('Invalid configuration');
    });

    it('should answer 400 for a color named after an object member', async () => {
      const response = await request(app)
        .post('/api/clock/render')
        .send({ width: 50, height: 50, elements: [{ type: 'Face', properties: { color: '__proto__' } }] })
        .expect(400);

      expect(response.body.message).toBe('Invalid Face properties: color: Invalid color specification: __proto__');
    });

    it('should require a time', async () => {
      const response = await request(app).post('/api/clock/create').send({ style: 'classic' }).expect(400);

      expect(response.body.message).toMatch(/^Invalid request: time: /);
    });
  });
});
