/**
 * personalities command: list the available playing styles.
 */

import { PERSONALITY_NAMES, resolvePersonality } from "@movecraft/engine";
import { formatPersonalities } from "../format";

export async function personalities(): Promise<void> {
  console.log(formatPersonalities(PERSONALITY_NAMES.map((name) => resolvePersonality(name))));
}
