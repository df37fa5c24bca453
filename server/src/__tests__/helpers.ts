/**
 * Shared fixtures for the test suites
 */
import type { Server } from 'http';
import { SoundCatalog } from '../sounds/SoundCatalog.js';
import { float32ToBase64Pcm16 } from '../audio/pcm.js';
import type { Classifier } from '../classifier/Classifier.js';
import type {
    AudioConfig,
    DetectionConfig,
    EngineConfig,
    FeatureTensor,
    ReactionMode,
    ServerMessage,
} from '../types/index.js';

// ── Config ───────────────────────────────────────────────────────────

/** 100-sample windows at 1 kHz keep feature extraction fast */
export const TEST_WINDOW = 100;

export interface TestConfigOverrides {
    audio?: Partial<AudioConfig>;
    detection?: Partial<DetectionConfig>;
    defaultMode?: ReactionMode;
    soundsDir?: string;
}

export function testConfig(overrides: TestConfigOverrides = {}): EngineConfig {
    return {
        audio: {
            sampleRate: 1000,
            windowSamples: TEST_WINDOW,
            hopSamples: TEST_WINDOW,
            inputGain: 1,
            silenceRms: 0,
            ...overrides.audio,
        },
        features: {
            sampleRate: 1000,
            windowSamples: TEST_WINDOW,
            nFft: 64,
            melBands: 8,
            timeFrames: 5,
            fMax: 400,
        },
        detection: {
            threshold: 0.75,
            cooldownSeconds: 3,
            ...overrides.detection,
        },
        classifier: 'onset',
        modelPath: '/nonexistent/drumming.onnx',
        soundsDir: overrides.soundsDir ?? '/nonexistent/sounds',
        defaultMode: overrides.defaultMode ?? 'predators',
    };
}

// ── Classifier ───────────────────────────────────────────────────────

/** Returns scripted confidences in order, then the fallback; an Error entry rejects */
export class ScriptedClassifier implements Classifier {
    readonly name = 'scripted';
    readonly calls: FeatureTensor[] = [];
    private loaded = false;
    private script: Array<number | Error>;

    constructor(script: Array<number | Error> = [], private fallback = 0) {
        this.script = [...script];
    }

    async load(): Promise<void> {
        this.loaded = true;
    }

    isLoaded(): boolean {
        return this.loaded;
    }

    async predict(tensor: FeatureTensor): Promise<number> {
        this.calls.push(tensor);
        const next = this.script.shift();
        if (next instanceof Error) throw next;
        return next ?? this.fallback;
    }

    async dispose(): Promise<void> {
        this.loaded = false;
    }
}

// ── Catalog & audio ──────────────────────────────────────────────────

export function testCatalog(): SoundCatalog {
    return new SoundCatalog('/sounds', {
        predator_hawk: ['hawk.mp3'],
        woodpecker_rival: ['drum.wav'],
    });
}

/** Base64 PCM16 chunk of `samples` samples at a constant level */
export function audioChunk(samples: number, level = 0.25): string {
    return float32ToBase64Pcm16(new Float32Array(samples).fill(level));
}

// ── Messages ─────────────────────────────────────────────────────────

export type MessageOf<T extends ServerMessage['type']> = Extract<ServerMessage, { type: T }>;

export function ofType<T extends ServerMessage['type']>(messages: ServerMessage[], type: T): MessageOf<T>[] {
    return messages.filter((m): m is MessageOf<T> => m.type === type);
}

// ── HTTP ─────────────────────────────────────────────────────────────

/** Listen on an ephemeral port on the loopback interface */
export async function listen(server: Server): Promise<number> {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
}

export function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}
