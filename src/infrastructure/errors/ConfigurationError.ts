/**
 * Raised at startup when the environment does not describe a usable setup.
 * Messages name the variable at fault but never echo credential values.
 */
export class ConfigurationError extends Error {
  public readonly variable: string | null;

  constructor(message: string, variable: string | null = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}
