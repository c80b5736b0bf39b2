/**
 * CLI errors, printed as "Error: <message>" by the entry point
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}
