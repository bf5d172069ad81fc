/**
 * profile command: print the skill profile a rating resolves to.
 */

import {
  isRatingInRange,
  resolveConfig,
  resolveSkillProfile,
  type Logger,
} from "@movecraft/engine";
import { formatSkillProfile } from "../format";
import { resolveSettings, type SettingsFlags } from "../settings";

export interface ProfileOptions extends SettingsFlags {
  json?: boolean;
}

export async function profile(options: ProfileOptions, logger: Logger): Promise<void> {
  const settings = resolveSettings(options);
  const config = resolveConfig(settings.arbiter);
  const skill = resolveSkillProfile(settings.rating, config);
  if (!isRatingInRange(settings.rating, config)) {
    logger.warn(`Rating ${settings.rating} is outside the supported range, using ${skill.targetRating}`);
  }
  console.log(options.json ? JSON.stringify(skill, null, 2) : formatSkillProfile(skill));
}
