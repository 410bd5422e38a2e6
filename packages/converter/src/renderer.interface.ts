export interface RenderOptions {
  timeoutMs: number;
  /** Display name of the source; only its extension reaches the renderer. */
  filename: string;
}

export interface IRenderer {
  readonly name: string;
  /** Convert `bytes` of `sourceMime` into a PDF. Throws classified AppErrors. */
  render(bytes: Uint8Array, sourceMime: string, options: RenderOptions): Promise<Uint8Array>;
  healthCheck(): Promise<boolean>;
}
