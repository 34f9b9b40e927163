import crypto from 'crypto';
import { EMBEDDING_CONSTANTS } from '../config/constants.js';
import { EmbeddingProvider, sanitizeEmbeddingInputs } from './base.js';

function normalizeVector(values: number[]): number[] {
  const magnitude = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0)) || 1;
  return values.map(value => value / magnitude);
}

export function buildDeterministicVector(text: string, dimensions: number): number[] {
  const hash = crypto.createHash('sha256').update(text).digest();
  const values: number[] = [];

  for (let i = 0; i < dimensions; i++) {
    const raw = hash[i % hash.length];
    // Spread values across a small range to avoid identical vectors
    values.push((raw / 255) * (1 + (i % 5) * 0.05));
  }

  return normalizeVector(values);
}

export interface MockProviderOptions {
  dimensions?: number;
  /** Reported provider name; lets tests stand in for another backend */
  name?: string;
  model?: string;
}

/**
 * Lightweight mock embedding provider for integration tests.
 * Generates deterministic vectors without external API calls.
 */
export class MockEmbeddingProvider extends EmbeddingProvider {
  private readonly dimensions: number;
  private readonly name: string;
  private readonly model: string;
  /** Number of `generateEmbeddings` calls served */
  calls = 0;
  /** Every input embedded so far, in order */
  readonly embeddedTexts: string[] = [];

  constructor(options: MockProviderOptions = {}) {
    super();
    this.dimensions = Math.max(1, Math.floor(options.dimensions ?? EMBEDDING_CONSTANTS.MOCK_DEFAULT_DIMENSIONS));
    this.name = options.name ?? 'mock';
    this.model = options.model ?? 'mock';
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getName(): string {
    return this.name;
  }

  getModelName(): string {
    return this.model;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.calls++;
    const input = sanitizeEmbeddingInputs(texts);
    this.embeddedTexts.push(...input);
    return input.map(text => buildDeterministicVector(text, this.dimensions));
  }
}
