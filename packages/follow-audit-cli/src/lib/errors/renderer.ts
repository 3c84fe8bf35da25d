import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Wrap text to fit within a given width, indenting continuation lines.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

function renderTextError(error: CLIError): void {
  const width = Math.min(getTerminalWidth(), 80) - 4;
  const output: string[] = [""];

  const [first, ...rest] = wrapText(error.message, width, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, width, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const [head, ...tail] = wrapText(error.suggestion, width, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`    ${line}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");

  for (const line of output) {
    console.error(line);
  }
}

function renderJSONError(error: CLIError): void {
  const output = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      example: error.example,
      details: error.details,
    },
  };

  // undefined fields are dropped by JSON.stringify
  console.error(JSON.stringify(output, null, 2));
}

/**
 * Render an error on stderr for the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      renderJSONError(error);
      break;
    case "text":
      renderTextError(error);
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}
