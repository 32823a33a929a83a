/**
 * Error thrown when a serializer is given a value it cannot represent
 */
export class BsonSerializationError extends Error {
  constructor(
    message: string,
    public readonly serializerKind: string
  ) {
    super(message);
    this.name = 'BsonSerializationError';
  }
}

/**
 * Error thrown when a class map is misconfigured or changed after use
 */
export class ClassMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassMapError';
  }
}
