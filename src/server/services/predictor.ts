import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../errors.js';
import type { ModelPrediction, PetClass } from '../types/prediction.js';

/**
 * The classifier as seen by the gateway: raw image bytes in, label and
 * per-class probabilities out.
 */
export interface Predictor {
  isLoaded(): boolean;
  predict(image: Buffer): Promise<ModelPrediction>;
  describe(): PredictorInfo;
}

export interface PredictorInfo {
  name: string;
  version: string;
  classes: Array<'Cat' | 'Dog'>;
  inputSize?: string;
  parameters?: number;
  source?: string;
}

const CLASSES: Array<'Cat' | 'Dog'> = ['Cat', 'Dog'];

function isProbability(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Builds a prediction from raw class scores. Scores are normalised so the two
 * probabilities sum to 1; ties go to Cat.
 */
export function toPrediction(scores: Record<PetClass, number>): ModelPrediction {
  if (!isProbability(scores.cat) || !isProbability(scores.dog)) {
    throw new Error('Model returned invalid class probabilities');
  }
  const sum = scores.cat + scores.dog;
  if (sum <= 0) {
    throw new Error('Model returned all-zero class probabilities');
  }

  const cat = scores.cat / sum;
  const dog = scores.dog / sum;
  const prediction = cat >= dog ? 'Cat' : 'Dog';
  return {
    prediction,
    confidence: Math.max(cat, dog),
    probabilities: { cat, dog },
  };
}

// ============================================================================
// HTTP MODEL SERVER
// ============================================================================

interface ModelServerInfo {
  version?: unknown;
  input_size?: unknown;
  parameters?: unknown;
}

interface ModelServerPrediction {
  probabilities?: { cat?: unknown; dog?: unknown };
}

export interface HttpPredictorOptions {
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

/**
 * Talks to a model server exposing GET /info and POST /predict
 * (octet-stream body, JSON `{ probabilities: { cat, dog } }` response).
 */
export class HttpPredictor implements Predictor {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private loaded = false;
  private info: ModelServerInfo = {};

  constructor(options: HttpPredictorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  /**
   * Checks that the model server answers; the gateway reports the model as
   * unavailable until this succeeds.
   */
  async load(): Promise<boolean> {
    try {
      const response = await this.http.get<ModelServerInfo>(`${this.baseUrl}/info`);
      this.info = response.data ?? {};
      this.loaded = true;
      console.log(`[Predictor] Model server ready at ${this.baseUrl}`);
    } catch (error) {
      this.loaded = false;
      console.error(`[Predictor] Model server unavailable at ${this.baseUrl}: ${errorMessage(error)}`);
    }
    return this.loaded;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  async predict(image: Buffer): Promise<ModelPrediction> {
    const response = await this.http.post<ModelServerPrediction>(`${this.baseUrl}/predict`, image, {
      headers: { 'Content-Type': 'application/octet-stream' },
    });
    const probabilities = response.data?.probabilities;
    const cat = probabilities?.cat;
    const dog = probabilities?.dog;
    if (typeof cat !== 'number' || typeof dog !== 'number') {
      throw new Error('Model server response is missing class probabilities');
    }
    return toPrediction({ cat, dog });
  }

  describe(): PredictorInfo {
    const { version, input_size: inputSize, parameters } = this.info;
    return {
      name: 'Cats vs Dogs Classifier',
      version: typeof version === 'string' ? version : 'unknown',
      classes: CLASSES,
      inputSize: typeof inputSize === 'string' ? inputSize : undefined,
      parameters: typeof parameters === 'number' ? parameters : undefined,
      source: this.baseUrl,
    };
  }
}

/**
 * Stand-in used when no model is configured: every request gets a 503.
 */
export class UnavailablePredictor implements Predictor {
  isLoaded(): boolean {
    return false;
  }

  async predict(): Promise<ModelPrediction> {
    throw new Error('No model configured');
  }

  describe(): PredictorInfo {
    return { name: 'Cats vs Dogs Classifier', version: 'unknown', classes: CLASSES };
  }
}
