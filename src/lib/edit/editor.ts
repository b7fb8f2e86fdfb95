import { spawnSync } from "child_process";
import { EditorError } from "../errors";

/**
 * Open `path` in the editor command and block until it exits.
 *
 * The command is split on whitespace so values like "code --wait" work.
 */
export function launchEditor(command: string, path: string): void {
  const [program, ...args] = command.trim().split(/\s+/);
  if (!program) {
    throw new EditorError("No editor configured");
  }

  const result = spawnSync(program, [...args, path], { stdio: "inherit" });

  if (result.error) {
    throw new EditorError(`Failed to open editor '${program}'`, { cause: result.error });
  }
  if (result.signal) {
    throw new EditorError(`Editor '${program}' was terminated by ${result.signal}`);
  }
  if (result.status !== 0) {
    throw new EditorError(`Editor '${program}' exited with status ${result.status}`);
  }
}
