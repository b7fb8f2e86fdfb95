import { loadConfig } from "../lib/config";
import { createClient } from "../lib/beeminder";
import { parseValue } from "../lib/datapoints";
import { BeelineError } from "../lib/errors";

export async function add(goal: string, value: string, comment?: string): Promise<void> {
  const parsed = parseValue(value);
  if (parsed === null) {
    throw new BeelineError(`Invalid value '${value}': expected a number`);
  }

  const client = createClient(loadConfig());
  await client.createDatapoint(goal, { value: parsed, comment });
  console.log(`Added datapoint to '${goal}' with value ${parsed}.`);
}
