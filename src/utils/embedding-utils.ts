/**
 * Embedding serialization and checks for SQLite BLOB storage.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array (4 bytes per dimension), so a 512-dimension embedding
 * takes 2KB.
 */
export function serializeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer, honouring the Buffer's
 * byte offset into its backing ArrayBuffer.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}

/**
 * True when every component is a finite number.
 */
export function isFiniteVector(embedding: readonly number[]): boolean {
  return embedding.length > 0 && embedding.every((v) => Number.isFinite(v));
}
