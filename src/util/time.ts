import { format } from "date-fns";

export function localDayKey(d = new Date()): string {
  return format(d, "yyyy-MM-dd"); // calendar day in local time
}
