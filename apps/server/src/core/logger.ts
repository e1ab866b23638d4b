export type Logger = {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
