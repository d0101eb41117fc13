import type { Types } from "mongoose";

export function refId(value: Types.ObjectId | null | undefined): string | null {
  return value ? value.toString() : null;
}
