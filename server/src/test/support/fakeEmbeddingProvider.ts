import type { EmbeddingProvider } from '../../ingest/types.js';

type Behaviour = (texts: string[], call: number) => Promise<number[][]> | number[][];

/**
 * Scriptable provider. Without a script, a text maps to a fixed vector when
 * one is registered, otherwise to a deterministic vector derived from it.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'fake';
  readonly calls: string[][] = [];
  active = 0;
  maxActive = 0;
  private readonly vectors = new Map<string, number[]>();

  constructor(private behaviour?: Behaviour) {}

  setVector(text: string, vector: number[]) {
    this.vectors.set(text, vector);
    return this;
  }

  script(behaviour: Behaviour | undefined) {
    this.behaviour = behaviour;
    return this;
  }

  vectorFor(text: string): number[] {
    const known = this.vectors.get(text);
    if (known) return [...known];
    let sum = 0;
    for (const ch of text) sum += ch.codePointAt(0) ?? 0;
    return [(text.length % 7) + 1, (sum % 11) + 1, 1];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const call = this.calls.length;
    this.calls.push([...texts]);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.behaviour) return await this.behaviour(texts, call);
      return texts.map((text) => this.vectorFor(text));
    } finally {
      this.active -= 1;
    }
  }
}

export const noSleep = async () => undefined;
