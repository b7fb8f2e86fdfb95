import { loadConfig } from "../lib/config";
import { createClient } from "../lib/beeminder";
import { formatGoal, sortGoals } from "../lib/goals";
import { shouldColor } from "../lib/ansi";

export async function list(): Promise<void> {
  const client = createClient(loadConfig());
  const goals = sortGoals(await client.getGoals());
  const color = shouldColor();

  for (const goal of goals) {
    console.log(formatGoal(goal, { color }));
  }
}
