import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import request from 'supertest';
import express from 'express';
import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Smoke tests for the show pages and JSON routes.
 * They run against the in-memory database and the built-in language list.
 */

// The indexer must not be reached from smoke tests
vi.mock('axios', async () => {
  const actual = await vi.importActual<typeof import('axios')>('axios');
  const mockAxiosInstance = {
    get: vi.fn(() => Promise.reject(new Error('Mock: API call not expected in smoke tests'))),
    post: vi.fn(() => Promise.reject(new Error('Mock: API call not expected in smoke tests'))),
  };
  return {
    ...actual,
    default: {
      ...actual.default,
      create: vi.fn(() => mockAxiosInstance),
    },
  };
});

import { createApp } from '../../src/app';
import db from '../../src/db';
import { QUALITY_PRESETS } from '../../src/quality/qualities';

describe('Show pages', () => {
  let app: express.Application;
  let showDir: string;

  beforeAll(async () => {
    db.exec('DELETE FROM show_scene_exceptions; DELETE FROM shows; DELETE FROM app_settings;');
    showDir = fs.mkdtempSync(path.join(os.tmpdir(), 'showshelf-smoke-'));
    app = createApp();

    await request(app)
      .post('/shows')
      .send({ indexer_id: 321, name: 'Smoke Show', location: showDir })
      .expect(201);
  });

  afterAll(() => {
    fs.rmSync(showDir, { recursive: true, force: true });
  });

  describe('Edit page', () => {
    it('should render the edit form', async () => {
      const response = await request(app).get('/shows/321/edit').expect(200);

      expect(response.text).toContain('Edit Show: Smoke Show');
      expect(response.text).toContain('name="flatten_folders"');
      expect(response.text).toMatch(/showshelf v\d+\.\d+\.\d+/);
    });

    it('should render a 404 page for an unknown show', async () => {
      const response = await request(app).get('/shows/999/edit').expect(404);

      expect(response.text).toContain('Show 999 not found');
    });

    it('should render a 400 page for a malformed id', async () => {
      const response = await request(app).get('/shows/abc/edit').expect(400);

      expect(response.text).toContain('Invalid show id');
    });
  });

  describe('Saving the form', () => {
    it('should save and redirect back to the form', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({
          show: '321',
          location: showDir,
          quality_preset: 'HD720p',
          defaultEpStatus: 'WANTED',
          indexerLang: 'fr',
          paused: 'on',
          flatten_folders: 'on',
          rls_ignore_words: 'german, dubbed',
          rls_require_words: '',
          search_delay: '2',
        })
        .expect(303);

      expect(response.headers.location).toBe('/shows/321/edit?saved=1');

      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show).toMatchObject({
        indexerId: 321,
        location: showDir,
        quality: QUALITY_PRESETS.HD720p,
        defaultEpisodeStatus: 'WANTED',
        language: 'fr',
        paused: true,
        seasonFolders: true,
        skipDownloaded: false,
        ignoreWords: ['german', 'dubbed'],
        requireWords: [],
        searchDelayDays: 2,
      });
    });

    it('should show the saved banner after the redirect', async () => {
      const response = await request(app).get('/shows/321/edit?saved=1').expect(200);

      expect(response.text).toContain('banner-success');
    });

    it('should treat unchecked boxes as off', async () => {
      await request(app).post('/shows/edit').type('form').send({ show: '321', location: showDir }).expect(303);

      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show.paused).toBe(false);
      expect(saved.body.show.seasonFolders).toBe(false);
      // untouched inputs keep their values
      expect(saved.body.show.language).toBe('fr');
      expect(saved.body.show.searchDelayDays).toBe(2);
    });

    it('should keep ticked quality boxes over the preset they started from', async () => {
      const page = await request(app).get('/shows/321/edit').expect(200);
      expect(page.text).toContain('<input type="hidden" name="quality_preset_shown" value="HD720p">');

      await request(app)
        .post('/shows/edit')
        .type('form')
        .send(
          `show=321&location=${encodeURIComponent(showDir)}` +
            '&quality_preset=SD&anyQualities=SDTV&anyQualities=SDDVD&anyQualities=HDTV'
        )
        .expect(303);

      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show.quality).toBe(7);
      expect(saved.body.qualityDescription).toBe('SDTV, SD DVD, 720p HDTV');
    });

    it('should remove every scene exception when none stay selected', async () => {
      await request(app).post('/shows/321/exceptions').send({ name: 'Form Alt' }).expect(200);

      await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '321', location: showDir, exceptions_shown: '1' })
        .expect(303);

      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show.sceneExceptions).toEqual([]);
    });

    it('should reject a search delay too large to store', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '321', location: showDir, search_delay: '99999999999999999999' })
        .expect(400);

      expect(response.text).toContain('<span class="field-error">is too large</span>');
      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show.searchDelayDays).toBe(2);
    });

    it('should re-render the form when the location does not exist', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '321', location: '/nonexistent/path', paused: 'on' })
        .expect(400);

      expect(response.text).toContain('Invalid location &#34;/nonexistent/path&#34;: does not exist');
      expect(response.text).toContain('Edit Show: Smoke Show');

      const saved = await request(app).get('/shows/321').expect(200);
      expect(saved.body.show.location).toBe(showDir);
      expect(saved.body.show.paused).toBe(false);
    });

    it('should re-render the form with field errors', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '321', location: showDir, search_delay: 'abc' })
        .expect(400);

      expect(response.text).toContain('<span class="field-error">must be a non-negative whole number</span>');
    });

    it('should reject an unsupported language', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '321', location: showDir, indexerLang: 'xx' })
        .expect(400);

      expect(response.text).toContain('Language &#34;xx&#34; is not supported by the indexer');
    });

    it('should render a 404 page when saving an unknown show', async () => {
      const response = await request(app)
        .post('/shows/edit')
        .type('form')
        .send({ show: '999', location: showDir })
        .expect(404);

      expect(response.text).toContain('Show 999 not found');
    });
  });

  describe('JSON routes', () => {
    it('should list shows', async () => {
      const response = await request(app).get('/shows').expect(200);

      expect(response.body.shows.map((show: { indexerId: number }) => show.indexerId)).toEqual([321]);
    });

    it('should refuse to add a show twice', async () => {
      const response = await request(app)
        .post('/shows')
        .send({ indexer_id: 321, name: 'Smoke Show', location: showDir })
        .expect(409);

      expect(response.body.code).toBe('ALREADY_EXISTS');
    });

    it('should report missing fields when adding a show', async () => {
      const response = await request(app).post('/shows').send({ indexer_id: 'abc' }).expect(400);

      expect(response.body.fields).toEqual({
        indexer_id: 'must be a show id',
        name: 'is required',
        location: 'is required',
      });
    });

    it('should reject a malformed id', async () => {
      const response = await request(app).get('/shows/abc').expect(400);

      expect(response.body).toEqual({ error: 'Invalid show id', code: 'VALIDATION' });
    });

    it('should queue a manual search once', async () => {
      const queued = await request(app).post('/shows/321/search').expect(202);
      expect(queued.body.success).toBe(true);
      expect(queued.body.queued).toMatchObject({ showId: 321, kind: 'manual', priority: 10 });

      const again = await request(app).post('/shows/321/search').expect(409);
      expect(again.body.code).toBe('ALREADY_QUEUED');

      await request(app).post('/shows/999/search').expect(404);
    });

    it('should check a release against the show word lists', async () => {
      const rejected = await request(app)
        .post('/shows/321/releases/check')
        .send({ release: 'Smoke.Show.S01E01.German.720p' })
        .expect(200);
      expect(rejected.body).toEqual({
        release: 'Smoke.Show.S01E01.German.720p',
        acceptable: false,
        rejection: { reason: 'ignored-word', word: 'german' },
        matchNames: ['Smoke Show'],
      });

      const accepted = await request(app)
        .post('/shows/321/releases/check')
        .send({ release: 'Smoke.Show.S01E01.720p' })
        .expect(200);
      expect(accepted.body.acceptable).toBe(true);
      expect(accepted.body.rejection).toBeNull();

      const missing = await request(app).post('/shows/321/releases/check').send({}).expect(400);
      expect(missing.body.fields).toEqual({ release: 'is required' });
    });

    it('should add and remove scene exceptions', async () => {
      const added = await request(app).post('/shows/321/exceptions').send({ name: 'Smoke Alt' }).expect(200);
      expect(added.body).toEqual({ success: true, added: true, sceneExceptions: ['Smoke Alt'] });

      const again = await request(app).post('/shows/321/exceptions').send({ name: 'smoke alt' }).expect(200);
      expect(again.body.added).toBe(false);

      const removed = await request(app).post('/shows/321/exceptions/remove').send({ name: 'Smoke Alt' }).expect(200);
      expect(removed.body).toEqual({ success: true, removed: true, sceneExceptions: [] });
    });

    it('should require a scene exception name', async () => {
      const response = await request(app).post('/shows/321/exceptions').send({ name: '  ' }).expect(400);

      expect(response.body.fields).toEqual({ name: 'is required' });
    });

    it('should delete a show', async () => {
      await request(app).delete('/shows/321').expect(200);
      await request(app).get('/shows/321').expect(404);
      await request(app).delete('/shows/321').expect(404);
    });
  });
});
