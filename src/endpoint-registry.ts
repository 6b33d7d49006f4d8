/**
 * Endpoint Registry
 *
 * The fixed, ordered fallback sequence of upstream endpoints. Built once at
 * startup and read-only afterwards.
 *
 * @packageDocumentation
 */

export interface Endpoint {
  /** Base URL of the upstream, without trailing slash. */
  readonly id: string;
  /** Position in the fallback sequence (0 = tried first). */
  readonly position: number;
}

export class EndpointRegistry {
  private readonly endpoints: readonly Endpoint[];

  constructor(urls: readonly string[]) {
    if (urls.length === 0) {
      throw new Error('At least one upstream endpoint must be configured');
    }
    this.endpoints = Object.freeze(
      urls.map((url, position) => Object.freeze({ id: url.replace(/\/+$/, ''), position }))
    );
  }

  /** Endpoints in fallback order. Every request scans from the first. */
  listEndpoints(): readonly Endpoint[] {
    return this.endpoints;
  }

  get size(): number {
    return this.endpoints.length;
  }
}
