/**
 * A request the server refuses to act on. The message is sent to the client as is.
 */
export class RequestError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'RequestError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `${message} (${configPath})` : message);
    this.name = 'ConfigError';
  }
}
