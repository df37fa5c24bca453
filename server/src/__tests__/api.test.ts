/**
 * api.test.ts — HTTP endpoints against an in-process server on an ephemeral port.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type Server } from 'http';
import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { createApp } from '../app.js';
import { Orchestrator } from '../orchestrator/index.js';
import { SoundCatalog } from '../sounds/SoundCatalog.js';
import { ScriptedClassifier, TEST_WINDOW, closeServer, listen, testConfig } from './helpers.js';

async function startServer(engine: Orchestrator): Promise<{ server: Server; base: string }> {
    const server = createServer(createApp(engine));
    const port = await listen(server);
    return { server, base: `http://127.0.0.1:${port}` };
}

function pcmBody(samples: number, value = 8192): Buffer {
    const bytes = Buffer.alloc(samples * 2);
    for (let i = 0; i < samples; i++) bytes.writeInt16LE(value, i * 2);
    return bytes;
}

function postPcm(url: string, body: Buffer): Promise<Response> {
    return fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body,
    });
}


// ═══════════════════════════════════════════════════════════════════════
// Ready engine
// ═══════════════════════════════════════════════════════════════════════

describe('with a ready engine', () => {
    let root: string;
    let engine: Orchestrator;
    let server: Server;
    let base: string;

    beforeAll(async () => {
        root = await mkdtemp(path.join(tmpdir(), 'drumwatch-api-'));
        await mkdir(path.join(root, 'predator_hawk'));
        await mkdir(path.join(root, 'woodpecker_rival'));
        await writeFile(path.join(root, 'predator_hawk', 'hawk.mp3'), 'ID3test');

        engine = new Orchestrator(testConfig(), {
            classifier: new ScriptedClassifier([0.3, 0.9]),
            catalog: await SoundCatalog.scan(root),
        });
        await engine.initialize();
        ({ server, base } = await startServer(engine));
    });

    afterAll(async () => {
        await closeServer(server);
        await engine.shutdown();
        await rm(root, { recursive: true, force: true });
    });

    it('GET /health', async () => {
        const res = await fetch(`${base}/health`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok' });
    });

    it('GET /api/status', async () => {
        const res = await fetch(`${base}/api/status`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            status: 'ready',
            ready: true,
            classifierLoaded: true,
            classifier: 'scripted',
            sampleRate: 1000,
            threshold: 0.75,
            cooldownSeconds: 3,
            categories: ['predator_hawk', 'woodpecker_rival'],
            totalAssets: 1,
            stats: {
                chunkCount: 0,
                detections: 0,
                triggers: 0,
                soundsPlayed: 0,
                lastCategory: null,
                activeSessions: 0,
                totalSessions: 0,
            },
            errors: [],
        });
    });

    it('GET /api/sounds lists assets per category', async () => {
        const res = await fetch(`${base}/api/sounds`);
        expect(await res.json()).toEqual({ predator_hawk: ['hawk.mp3'], woodpecker_rival: [] });
    });

    it('GET /api/sound/:category/:filename serves the asset', async () => {
        const res = await fetch(`${base}/api/sound/predator_hawk/hawk.mp3`);
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('audio/mpeg');
        expect(await res.text()).toBe('ID3test');
    });

    it('GET /api/sound answers 404 for an unknown asset', async () => {
        const res = await fetch(`${base}/api/sound/predator_hawk/owl.mp3`);
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'Not found' });
    });

    it('GET /api/sound does not leave the sound directory', async () => {
        const res = await fetch(`${base}/api/sound/predator_hawk/..%2F..%2Fetc%2Fpasswd`);
        expect(res.status).toBe(404);
    });

    it('POST /api/analyze returns per-window confidences', async () => {
        const res = await postPcm(`${base}/api/analyze`, pcmBody(TEST_WINDOW * 2));
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            windows: 2,
            confidences: [0.3, 0.9],
            maxConfidence: 0.9,
            detected: true,
        });
    });

    it('POST /api/analyze rejects an odd byte count', async () => {
        const res = await postPcm(`${base}/api/analyze`, Buffer.alloc(TEST_WINDOW * 2 + 1));
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: `Audio payload has ${TEST_WINDOW * 2 + 1} bytes, expected 16-bit samples` });
    });

    it('POST /api/analyze rejects a recording shorter than one window', async () => {
        const res = await postPcm(`${base}/api/analyze`, pcmBody(TEST_WINDOW - 1));
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: `Recording is shorter than one window (${TEST_WINDOW - 1} < ${TEST_WINDOW} samples)`,
        });
    });

    it('POST /api/analyze rejects a body of the wrong type', async () => {
        const res = await fetch(`${base}/api/analyze`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{}',
        });
        expect(res.status).toBe(400);
    });
});


// ═══════════════════════════════════════════════════════════════════════
// Engine not ready
// ═══════════════════════════════════════════════════════════════════════

describe('with an engine that failed to start', () => {
    let engine: Orchestrator;
    let server: Server;
    let base: string;

    beforeAll(async () => {
        engine = new Orchestrator(testConfig(), {
            classifier: new ScriptedClassifier(),
            catalog: new SoundCatalog('/sounds', { predator_hawk: [] }),
        });
        await engine.initialize();
        ({ server, base } = await startServer(engine));
    });

    afterAll(async () => {
        await closeServer(server);
    });

    it('still serves status with the recorded errors', async () => {
        const res = await fetch(`${base}/api/status`);
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            status: 'not_ready',
            ready: false,
            categories: [],
            totalAssets: 0,
            errors: ['No reaction sounds found under /sounds'],
        });
    });

    it('answers analysis with 503', async () => {
        const res = await postPcm(`${base}/api/analyze`, pcmBody(TEST_WINDOW));
        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({ error: 'Engine not ready' });
    });

    it('lists no sounds', async () => {
        const res = await fetch(`${base}/api/sounds`);
        expect(await res.json()).toEqual({});
    });
});
