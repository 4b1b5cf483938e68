export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const clampUnit = (value: number): number => clamp(value, 0, 1);

export const clampSigned = (value: number): number => clamp(value, -1, 1);
