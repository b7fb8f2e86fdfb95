import { loadConfig } from "../lib/config";
import { createClient } from "../lib/beeminder";
import { editDatapoints } from "../lib/edit";

export async function edit(goal: string): Promise<void> {
  const config = loadConfig();
  await editDatapoints(createClient(config), goal, { editor: config.editor });
}
