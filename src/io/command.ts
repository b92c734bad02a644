/**
 * External command execution through the Effect platform CommandExecutor
 */

import { Command } from "@effect/platform";
import { Effect, Stream } from "effect";
import { AlignerError } from "../errors";
import { getPlatform } from "./runtime";

export interface CommandSpec {
  command: string;
  args: readonly string[];
}

export interface CommandResult {
  stdout: string;
  exitCode: number;
}

/**
 * Render a command line for logs and error messages
 */
export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args]
    .map((part) => (/[\s"]/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(" ");
}

/**
 * Run a command to completion, collecting stdout; stderr is passed through
 * to the parent's stderr.
 *
 * @throws {AlignerError} If the command cannot be started or exits non-zero
 */
export async function runCommand(spec: CommandSpec): Promise<CommandResult> {
  const command = Command.make(spec.command, ...spec.args).pipe(Command.stderr("inherit"));

  const program = Effect.scoped(
    Effect.gen(function* () {
      const child = yield* Command.start(command);
      const [stdout, exitCode] = yield* Effect.all(
        [
          child.stdout.pipe(
            Stream.decodeText(),
            Stream.runFold("", (text, chunk) => text + chunk)
          ),
          child.exitCode,
        ],
        { concurrency: 2 }
      );
      return { stdout, exitCode: Number(exitCode) };
    })
  );

  let result: CommandResult;
  try {
    result = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw new AlignerError(
      `Could not run ${spec.command}: ${error instanceof Error ? error.message : String(error)}`,
      formatCommand(spec)
    );
  }

  if (result.exitCode !== 0) {
    throw new AlignerError(
      `${spec.command} exited with status ${result.exitCode}`,
      formatCommand(spec),
      result.exitCode
    );
  }
  return result;
}
