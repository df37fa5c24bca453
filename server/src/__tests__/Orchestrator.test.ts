/**
 * Orchestrator.test.ts — startup readiness, session lifecycle, global stats
 * and offline analysis.
 */
import { describe, it, expect, vi } from 'vitest';
import { Orchestrator } from '../orchestrator/index.js';
import { OnnxClassifier } from '../classifier/OnnxClassifier.js';
import { SoundCatalog } from '../sounds/SoundCatalog.js';
import { createSeededRng } from '../utils/random.js';
import { StartupError } from '../errors.js';
import type { ServerMessage } from '../types/index.js';
import { ScriptedClassifier, TEST_WINDOW, audioChunk, testCatalog, testConfig } from './helpers.js';

function readyEngine(script: Array<number | Error> = []): Orchestrator {
    return new Orchestrator(testConfig(), {
        classifier: new ScriptedClassifier(script),
        catalog: testCatalog(),
        rng: createSeededRng(1),
        clock: () => 0,
    });
}


// ═══════════════════════════════════════════════════════════════════════
// Readiness
// ═══════════════════════════════════════════════════════════════════════

describe('initialize', () => {

    it('becomes ready with a classifier and a non-empty catalog', async () => {
        const engine = readyEngine();
        const onReady = vi.fn();
        engine.on('ready', onReady);

        await expect(engine.initialize()).resolves.toBe(true);
        expect(engine.isReady()).toBe(true);
        expect(onReady).toHaveBeenCalledTimes(1);
        expect(engine.getStatus()).toMatchObject({
            status: 'ready',
            ready: true,
            classifierLoaded: true,
            classifier: 'scripted',
            categories: ['predator_hawk', 'woodpecker_rival'],
            totalAssets: 2,
            errors: [],
        });
    });

    it('stays not ready when the model file is missing', async () => {
        const engine = new Orchestrator(testConfig(), {
            classifier: new OnnxClassifier('/nonexistent/drumming.onnx', { melBands: 8, timeFrames: 5 }),
            catalog: testCatalog(),
        });

        await expect(engine.initialize()).resolves.toBe(false);
        const status = engine.getStatus();
        expect(status).toMatchObject({ status: 'not_ready', ready: false, classifierLoaded: false, classifier: 'onnx' });
        expect(status.errors).toHaveLength(1);
        expect(status.errors[0]).toMatch(/^Classifier model not readable at \/nonexistent\/drumming\.onnx/);
    });

    it('stays not ready when no category has an asset', async () => {
        const engine = new Orchestrator(testConfig(), {
            classifier: new ScriptedClassifier(),
            catalog: new SoundCatalog('/sounds', { predator_hawk: [], woodpecker_rival: [] }),
        });

        await expect(engine.initialize()).resolves.toBe(false);
        expect(engine.getStatus().errors).toEqual(['No reaction sounds found under /sounds']);
        expect(engine.getCatalog()).toBeNull();
    });

    it('stays not ready when the sound directory is missing', async () => {
        const engine = new Orchestrator(testConfig({ soundsDir: '/nonexistent/sounds' }), {
            classifier: new ScriptedClassifier(),
        });

        await expect(engine.initialize()).resolves.toBe(false);
        expect(engine.getStatus().errors[0]).toMatch(/^Sound directory \/nonexistent\/sounds is not readable/);
    });

    it('stays not ready when configuration problems are passed in', async () => {
        const engine = readyEngine();

        await expect(engine.initialize(['CONFIDENCE_THRESHOLD must be within 0..1 (got 1.5)'])).resolves.toBe(false);
        expect(engine.getStatus()).toMatchObject({
            status: 'not_ready',
            classifierLoaded: true,
            errors: ['Invalid configuration: CONFIDENCE_THRESHOLD must be within 0..1 (got 1.5)'],
        });
        expect(() => engine.openSession(() => undefined)).toThrow(StartupError);
    });

    it('refuses sessions until ready', () => {
        const engine = readyEngine();
        expect(() => engine.openSession(() => undefined)).toThrow(StartupError);
    });
});


// ═══════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════

describe('sessions', () => {

    it('numbers sessions and tracks how many are open', async () => {
        const engine = readyEngine();
        await engine.initialize();

        const a = engine.openSession(() => undefined);
        const b = engine.openSession(() => undefined);
        expect([a.id, b.id]).toEqual(['session_1', 'session_2']);
        expect(engine.getSessionCount()).toBe(2);

        engine.closeSession(a.id);
        expect(engine.getSessionCount()).toBe(1);
        expect(engine.getSession(a.id)).toBeUndefined();
        expect(a.isClosed()).toBe(true);
    });

    it('a reconnect after a mid-window disconnect starts clean', async () => {
        const engine = readyEngine([0.9, 0.9]);
        await engine.initialize();

        const first = engine.openSession(() => undefined);
        await first.handleMessage({ type: 'audio', audio: audioChunk(TEST_WINDOW) });
        await first.handleMessage({ type: 'audio', audio: audioChunk(TEST_WINDOW / 2) });
        expect(first.bufferedSamples()).toBe(TEST_WINDOW / 2);
        engine.closeSession(first.id);

        const sent: ServerMessage[] = [];
        const second = engine.openSession((m) => sent.push(m));
        expect(second.bufferedSamples()).toBe(0);
        expect(second.getStats()).toEqual({
            chunkCount: 0,
            detections: 0,
            triggers: 0,
            soundsPlayed: 0,
            lastCategory: null,
        });
        expect(second.getDetector().getState()).toBe('IDLE');

        // Half a window is not enough: nothing carried over from the first session
        await second.handleMessage({ type: 'audio', audio: audioChunk(TEST_WINDOW / 2) });
        expect(sent).toEqual([]);
    });

    it('keeps global totals across closed sessions', async () => {
        const engine = readyEngine([0.9]);
        await engine.initialize();

        const session = engine.openSession(() => undefined);
        await session.handleMessage({ type: 'audio', audio: audioChunk(TEST_WINDOW) });
        expect(engine.getStatus().stats).toEqual({
            chunkCount: 1,
            detections: 1,
            triggers: 1,
            soundsPlayed: 1,
            lastCategory: 'predator_hawk',
            activeSessions: 1,
            totalSessions: 1,
        });

        engine.closeSession(session.id);
        expect(engine.getStatus().stats).toMatchObject({ chunkCount: 1, soundsPlayed: 1, activeSessions: 0, totalSessions: 1 });
    });

    it('shutdown closes every session and releases the classifier', async () => {
        const classifier = new ScriptedClassifier();
        const engine = new Orchestrator(testConfig(), { classifier, catalog: testCatalog() });
        await engine.initialize();
        const session = engine.openSession(() => undefined);

        await engine.shutdown();

        expect(session.isClosed()).toBe(true);
        expect(engine.isReady()).toBe(false);
        expect(classifier.isLoaded()).toBe(false);
    });
});


// ═══════════════════════════════════════════════════════════════════════
// Inference
// ═══════════════════════════════════════════════════════════════════════

describe('infer', () => {

    it('serves queued windows first in, first out', async () => {
        const engine = readyEngine([0.1, 0.2, 0.3]);
        await engine.initialize();
        const tensor = { data: new Float32Array(40), melBands: 8, timeFrames: 5 };

        const results = Promise.all([engine.infer(tensor), engine.infer(tensor), engine.infer(tensor)]);
        expect(engine.pendingInferences()).toBe(3);
        await expect(results).resolves.toEqual([0.1, 0.2, 0.3]);
    });
});

describe('analyze', () => {

    it('classifies each whole window without cooldown', async () => {
        const engine = readyEngine([0.2, 0.8, 0.9]);
        await engine.initialize();

        const samples = new Int16Array(TEST_WINDOW * 3 + 20).fill(8192);
        await expect(engine.analyze(samples)).resolves.toEqual({
            windows: 3,
            confidences: [0.2, 0.8, 0.9],
            maxConfidence: 0.9,
            detected: true,
        });
    });

    it('reports no detection below the threshold', async () => {
        const engine = readyEngine([0.5]);
        await engine.initialize();

        const result = await engine.analyze(new Int16Array(TEST_WINDOW).fill(8192));
        expect(result).toEqual({ windows: 1, confidences: [0.5], maxConfidence: 0.5, detected: false });
    });

    it('scores a failed window 0 and keeps going', async () => {
        const engine = readyEngine([0.9, new Error('bad tensor'), 0.2]);
        await engine.initialize();

        const result = await engine.analyze(new Int16Array(TEST_WINDOW * 3).fill(8192));
        expect(result).toEqual({ windows: 3, confidences: [0.9, 0, 0.2], maxConfidence: 0.9, detected: true });
    });
});
