/**
 * Reminders: Named Presets
 *
 * A preset is a fixed recurrence referenced by name. A preset with its
 * own zone ignores the reminder's zone.
 */

export interface PresetDefinition {
  expression: string;
  /** Fixed zone; when absent the reminder's zone applies */
  timezone?: string;
  description: string;
}

export const PRESETS = {
  every_minute: {
    expression: "* * * * *",
    description: "every minute",
  },
  hourly: {
    expression: "0 * * * *",
    description: "at the top of every hour",
  },
  daily_noon: {
    expression: "0 12 * * *",
    description: "daily at 12:00",
  },
  weekday_morning: {
    expression: "0 9 * * 1-5",
    description: "Monday to Friday at 09:00",
  },
  // Five minutes before the 14:00, 16:00, 18:00, 20:00, 22:00 and 00:00 starts
  tournament: {
    expression: "55 13,15,17,19,21,23 * * *",
    timezone: "Europe/Moscow",
    description: "5 minutes before each quick tournament (Moscow time)",
  },
} satisfies Record<string, PresetDefinition>;

export type PresetName = keyof typeof PRESETS;

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

export const PRESET_NAMES: PresetName[] = Object.keys(PRESETS).filter(isPresetName);

export function getPreset(name: PresetName): PresetDefinition {
  return PRESETS[name];
}

/** Minutes between a tournament reminder and the start it announces. */
export const TOURNAMENT_LEAD_MINUTES = 5;
