export const now = () => Date.now();

export const clampNumber = (value: number | undefined, min: number, max: number) => {
  if (value === undefined || Number.isNaN(value)) return undefined;
  return Math.min(max, Math.max(min, value));
};

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
