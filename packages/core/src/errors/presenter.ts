/**
 * ErrorPresenter - pure presentation layer for PassmithError instances
 * - No business logic; formats into a view object the CLI renders
 */

import type { ErrorCode, Severity } from './codes.js';
import type { ErrorContext, PassmithError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  severity: Severity;
  location?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PassmithError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      severity: error.severity,
      location: this.#formatLocation(error.context),
      workaround: error.context?.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  #formatTitle(error: PassmithError): string {
    const label = error.severity === 'warn' ? 'Warning' : 'Error';
    return `${label} ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.template !== undefined) return `Template: ${ctx.template}`;
    if (ctx.input !== undefined) return `Input: ${ctx.input}`;
    if (ctx.setting !== undefined) return `Setting: ${ctx.setting}`;
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
