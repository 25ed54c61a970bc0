/**
 * Builds absolute URLs that bring a subject back into a flow.
 */
export interface FlowUrlBuilder {
  build(params: { baseUrl: string; flowSlug: string; query?: Record<string, string> }): string;
}
