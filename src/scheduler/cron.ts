import { Cron } from "croner";

/** Next fire time strictly after `after`, or `null` when the pattern never fires again. */
export function nextCronFire(expression: string, after: number, timezone?: string | null): number | null {
  const job = new Cron(expression, { paused: true, ...(timezone ? { timezone } : {}) });
  try {
    return job.nextRun(new Date(after))?.getTime() ?? null;
  } finally {
    job.stop();
  }
}

export function validateCron(expression: string, timezone?: string | null): string | null {
  try {
    nextCronFire(expression, Date.now(), timezone);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

const DAY_NUMBERS: Record<string, number> = {
  sun: 0,
  mon: 1,
  tue: 2,
  wed: 3,
  thu: 4,
  fri: 5,
  sat: 6,
};

/**
 * Builds a cron pattern from `HH:MM` and a day list such as `mon-fri`,
 * `daily`, `weekends` or `mon,wed,fri`.
 */
export function cronFromSchedule(time: string, days: string): string {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new Error(`Invalid time "${time}", expected HH:MM`);
  }
  return `${minute} ${hour} * * ${dayField(days)}`;
}

function dayField(days: string): string {
  const daySet = days.trim().toLowerCase();
  if (daySet === "daily" || daySet === "every day" || daySet === "*") return "*";
  if (daySet === "weekdays") return "1-5";
  if (daySet === "weekends") return "0,6";

  return daySet
    .split(",")
    .map((part) => {
      const [from, to] = part.trim().split("-");
      const start = DAY_NUMBERS[from?.slice(0, 3) ?? ""];
      if (start === undefined) throw new Error(`Unknown day "${part.trim()}"`);
      if (to === undefined) return String(start);
      const end = DAY_NUMBERS[to.slice(0, 3)];
      if (end === undefined) throw new Error(`Unknown day "${to}"`);
      return `${start}-${end}`;
    })
    .join(",");
}
