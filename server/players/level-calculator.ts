/**
 * Experience <-> level derivation
 *
 * Level L starts at 20 * L * (L - 1) experience: level 1 at 0, level 2 at 40,
 * level 3 at 120, level 4 at 240, ...
 */

const XP_STEP = 20;

export const MIN_LEVEL = 1;

// highest level whose threshold still fits an integer xp column
export const MAX_LEVEL = 10362;

export function levelToExperienceThreshold(level: number): number {
  const l = Math.floor(level);
  if (l <= MIN_LEVEL) return 0;
  return XP_STEP * l * (l - 1);
}

/** Capped at MAX_LEVEL, which every experience value the column can hold stays within. */
export function experienceToLevel(experience: number): number {
  const xp = Math.floor(experience);
  if (!(xp > 0)) return MIN_LEVEL;
  if (!Number.isFinite(xp) || xp >= levelToExperienceThreshold(MAX_LEVEL)) return MAX_LEVEL;

  // closed form of 20 * L * (L - 1) <= xp, corrected for float rounding
  let level = Math.max(MIN_LEVEL, Math.floor((1 + Math.sqrt(1 + xp / 5)) / 2));
  while (levelToExperienceThreshold(level + 1) <= xp) level++;
  while (level > MIN_LEVEL && levelToExperienceThreshold(level) > xp) level--;
  return level;
}

/** Fraction of the way from the current level's threshold to the next, in [0, 1). */
export function progressToNextLevel(experience: number): number {
  const xp = Math.max(0, Math.floor(experience));
  const level = experienceToLevel(xp);
  const floor = levelToExperienceThreshold(level);
  const next = levelToExperienceThreshold(level + 1);
  return (xp - floor) / (next - floor);
}
