export type MeshErrorCode =
  | "invalid-resolution"
  | "degenerate-bounds"
  | "sample-limit"
  | "empty-surface"
  | "non-manifold";

export class MeshError extends Error {
  public readonly code: MeshErrorCode;

  public constructor(code: MeshErrorCode, message: string) {
    super(message);
    this.name = "MeshError";
    this.code = code;
  }
}
