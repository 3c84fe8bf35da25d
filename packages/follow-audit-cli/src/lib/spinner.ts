/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode and tests.
 */
export class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    this.isSpinning = true;
    return this;
  }

  stop(): Spinner {
    this.isSpinning = false;
    return this;
  }

  succeed(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    this.isSpinning = false;
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora(text);
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }
}

export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
