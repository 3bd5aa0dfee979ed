export class MobFileError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(`${message}: ${filePath}`);
    this.name = 'MobFileError';
    this.filePath = filePath;
  }
}
