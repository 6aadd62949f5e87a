export const isDev = () => process.env.NODE_ENV !== "production";

export const dlog = (...args: unknown[]) => {
  if (isDev()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (isDev()) console.warn(...args);
};

/** Errors always reach stderr; the dev build adds the raw error object for the stack. */
export const derr = (message: string, error?: unknown) => {
  if (isDev() && error !== undefined) console.error(message, error);
  else console.error(message);
};
