// utils/logger.ts

import { colors, subject, type Tone } from "./logColors.js";

export interface LoggerOptions {
  silent?: boolean;
}

export class Logger {
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.silent = options.silent ?? false;
  }

  section(title: string) {
    if (this.silent) return;
    console.log(`${colors.section}${colors.bold}${title}:${colors.reset}`);
  }

  success(action: string, text: string) {
    this.line("success", action, text);
  }

  warn(action: string, text: string) {
    this.line("warn", action, text);
  }

  error(action: string, text: string) {
    this.line("error", action, text);
  }

  processing(action: string, text: string) {
    this.line("processing", action, text);
  }

  private line(tone: Tone, action: string, text: string) {
    if (this.silent) return;
    console.log(`  ${colors[tone]}${action}:${colors.reset} ${subject(text)}`);
  }
}
