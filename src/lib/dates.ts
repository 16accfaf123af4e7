import { site } from '@/lib/site';

type DateSettings = { locale: string; timeZone: string };

export function formatPostDate(iso: string, settings: DateSettings = site): string {
  return new Intl.DateTimeFormat(settings.locale, {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    timeZone: settings.timeZone,
  }).format(new Date(iso));
}

const FILE_DATE = /^(\d{4})-(\d{2})-(\d{2})-/;

/** Splits a `2018-03-05-title.md` style name into its date and the rest. */
export function splitDatedName(name: string): { date?: Date; rest: string } {
  const m = FILE_DATE.exec(name);
  if (!m) return { rest: name };
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  if (Number.isNaN(date.getTime()) || date.getUTCDate() !== Number(m[3])) return { rest: name };
  return { date, rest: name.slice(m[0].length) };
}
