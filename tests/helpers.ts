import { readFileSync } from "node:fs";

export const AKN3 = "http://docs.oasis-open.org/legaldocml/ns/akn/3.0";
export const AKN2 = "http://www.akomantoso.org/2.0";

export function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}
