import { confirm, select } from "@inquirer/prompts";
import { CancelledError } from "./errors.js";
import type { CollisionAnswer, CollisionPrompt } from "../types.js";

const CANCEL_ERRORS = new Set(["ExitPromptError", "AbortPromptError"]);

/** Turns an interrupted prompt into a {@link CancelledError}; anything else propagates. */
export function rethrowCancel(error: unknown): never {
  if (error instanceof Error && CANCEL_ERRORS.has(error.name)) {
    throw new CancelledError({ cause: error });
  }
  throw error;
}

export const askCollision: CollisionPrompt = async (relPath: string): Promise<CollisionAnswer> => {
  return select<CollisionAnswer>({
    message: `${relPath} already exists. What do you want to do?`,
    choices: [
      { name: "Skip (keep existing)", value: "skip" },
      { name: "Overwrite (replace with template)", value: "overwrite" },
    ],
  }).catch(rethrowCancel);
};

export async function confirmRemoval(names: string[]): Promise<boolean> {
  const subject = names.length === 1 ? `"${names[0]}"` : `${names.length} templates`;
  return confirm({
    message: `Remove ${subject} from the registry? (Template files are not deleted)`,
    default: false,
  }).catch(rethrowCancel);
}
