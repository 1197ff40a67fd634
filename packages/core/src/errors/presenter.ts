/**
 * ErrorPresenter - pure presentation layer for SinkbenchError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type { SinkbenchError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SinkbenchError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error),
      workaround: error.context?.suggestion,
      cause: error.cause ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForProduction(error: SinkbenchError): SerializedError {
    return error.toJSON(this._env);
  }

  #formatLocation(error: SinkbenchError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    if (ctx.file) {
      return ctx.vectorId
        ? `Location: ${ctx.file} (vector ${ctx.vectorId})`
        : `Location: ${ctx.file}`;
    }
    if (ctx.setting) return `Setting: ${ctx.setting}`;
    return undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
