import { confirm } from "@inquirer/prompts";
import type { IOverwritePrompt } from "../../core/domain/services/overwrite-prompt.service.js";

/** Asks on the terminal; declines whenever stdin or stdout is not a TTY. */
export class InquirerOverwritePrompt implements IOverwritePrompt {
  async confirmOverwrite(path: string): Promise<boolean> {
    if (!process.stdin.isTTY || !process.stdout.isTTY) return false;
    return confirm({
      message: `Do you wish to overwrite output file ${path}?`,
      default: false,
    });
  }
}
