import { pathToFileURL } from "node:url";

export function isEntrypoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (process.env.NODE_ENV === "test" || script === undefined) return false;
  return pathToFileURL(script).href === moduleUrl;
}
