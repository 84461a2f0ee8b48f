import type { DeterministicRNG } from '@xolrisk/core';

/**
 * Replays fixed draws so tests can pin exact outcomes. Throws once a queue
 * runs dry, which also catches code that draws when it should not.
 */
export class SequenceRNG implements DeterministicRNG {
  private readonly uniforms: number[];
  private readonly normals: number[];

  constructor(uniforms: number[] = [], normals: number[] = []) {
    this.uniforms = [...uniforms];
    this.normals = [...normals];
  }

  get remaining(): number {
    return this.uniforms.length + this.normals.length;
  }

  next(): number {
    const value = this.uniforms.shift();
    if (value === undefined) throw new Error('SequenceRNG: no uniform draws left');
    return value;
  }

  nextOpen(): number {
    return this.next();
  }

  nextStandardNormal(): number {
    const value = this.normals.shift();
    if (value === undefined) throw new Error('SequenceRNG: no normal draws left');
    return value;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  getSeed(): number {
    return 0;
  }

  clone(): DeterministicRNG {
    return new SequenceRNG(this.uniforms, this.normals);
  }
}
