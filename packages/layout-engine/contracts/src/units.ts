/** PDF user-space units per millimetre. */
export const POINTS_PER_MM = 72 / 25.4;

export const mm = (value: number): number => value * POINTS_PER_MM;
