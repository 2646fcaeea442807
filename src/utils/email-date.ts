// RFC 2822 date parsing, lenient about the deviations seen in real mail

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11
};

// Offsets in minutes east of UTC
const ZONE_OFFSETS: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  EST: -300, EDT: -240,
  CST: -360, CDT: -300,
  MST: -420, MDT: -360,
  PST: -480, PDT: -420
};

const RFC2822_PATTERN =
  /^\s*(?:[a-z]{3,9},?\s*)?(\d{1,2})[\s-]+([a-z]{3,9})\.?[\s-]+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([+-]\d{4}|[a-z]{1,5}))?/i;

const ISO8601_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

function expandYear(raw: string): number {
  const year = parseInt(raw, 10);
  if (raw.length === 2) return year < 50 ? 2000 + year : 1900 + year;
  if (raw.length === 3) return 1900 + year;
  return year;
}

function zoneOffset(zone: string | undefined): number {
  if (!zone) return 0;

  const numeric = zone.match(/^([+-])(\d{2})(\d{2})$/);
  if (numeric) {
    const minutes = parseInt(numeric[2], 10) * 60 + parseInt(numeric[3], 10);
    return numeric[1] === '-' ? -minutes : minutes;
  }

  // Unknown (including military) zones are read as UTC
  return ZONE_OFFSETS[zone.toUpperCase()] ?? 0;
}

export function parseEmailDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;

  const match = value.match(RFC2822_PATTERN);
  if (!match) {
    if (ISO8601_PATTERN.test(value.trim())) {
      const iso = new Date(value.trim());
      return Number.isNaN(iso.getTime()) ? undefined : iso;
    }
    return undefined;
  }

  const [, dayRaw, monthRaw, yearRaw, hourRaw, minuteRaw, secondRaw, zone] = match;
  const month = MONTHS[monthRaw.slice(0, 3).toLowerCase()];
  if (month === undefined) return undefined;

  const day = parseInt(dayRaw, 10);
  const year = expandYear(yearRaw);
  const hour = parseInt(hourRaw, 10);
  const minute = parseInt(minuteRaw, 10);
  const second = secondRaw ? parseInt(secondRaw, 10) : 0;

  if (day < 1 || day > 31 || hour > 23 || minute > 59 || second > 60) return undefined;

  const local = new Date(Date.UTC(year, month, day, hour, minute, Math.min(second, 59)));
  // Reject rollovers such as 31 Feb
  if (local.getUTCDate() !== day || local.getUTCMonth() !== month) return undefined;

  return new Date(local.getTime() - zoneOffset(zone) * 60_000);
}
