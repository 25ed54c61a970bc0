import type { FlowUrlBuilder } from '../interfaces/url-builder';

export interface FlowUrlBuilderOptions {
  /** Path with a `:flowSlug` placeholder (default: '/if/flow/:flowSlug/') */
  pathTemplate?: string;
}

export class DefaultFlowUrlBuilder implements FlowUrlBuilder {
  private readonly pathTemplate: string;

  constructor(options: FlowUrlBuilderOptions = {}) {
    this.pathTemplate = options.pathTemplate ?? '/if/flow/:flowSlug/';
  }

  build(params: { baseUrl: string; flowSlug: string; query?: Record<string, string> }): string {
    const path = this.pathTemplate.replace(':flowSlug', encodeURIComponent(params.flowSlug));
    const url = new URL(path, params.baseUrl);
    for (const [key, value] of Object.entries(params.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }
}
