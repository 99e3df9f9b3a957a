/**
 * Minimal iCalendar (RFC 5545) reader: turns the first VEVENT of a calendar
 * into a Calendar API event resource for `events.import`.
 */

import type { calendar_v3 } from "googleapis";

type Property = {
  name: string;
  params: Record<string, string>;
  value: string;
};

function unfold(text: string): string[] {
  return text.replace(/\r\n/g, "\n").replace(/\n[ \t]/g, "").split("\n");
}

function parseProperty(line: string): Property | undefined {
  // The value starts at the first colon outside a quoted parameter.
  let inQuotes = false;
  let colon = -1;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === ":" && !inQuotes) {
      colon = i;
      break;
    }
  }
  if (colon <= 0) return undefined;

  const [rawName = "", ...rawParams] = line.slice(0, colon).split(";");
  const params: Record<string, string> = {};
  for (const param of rawParams) {
    const eq = param.indexOf("=");
    if (eq <= 0) continue;
    params[param.slice(0, eq).toUpperCase()] = param.slice(eq + 1).replace(/^"|"$/g, "");
  }
  return { name: rawName.toUpperCase(), params, value: line.slice(colon + 1) };
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, ch: string) =>
    ch === "n" || ch === "N" ? "\n" : ch,
  );
}

function addOneDay(date: string): string {
  const next = new Date(`${date}T00:00:00Z`);
  next.setUTCDate(next.getUTCDate() + 1);
  return next.toISOString().slice(0, 10);
}

/**
 * Convert DTSTART/DTEND to a Calendar API time.
 */
export function toEventDateTime(property: Property): calendar_v3.Schema$EventDateTime {
  const value = property.value.trim();
  const dateOnly = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (dateOnly || property.params.VALUE === "DATE") {
    const [, y, m, d] = dateOnly ?? /^(\d{4})(\d{2})(\d{2})/.exec(value) ?? [];
    if (!y || !m || !d) throw new Error(`Invalid date: ${value}`);
    return { date: `${y}-${m}-${d}` };
  }

  const stamp = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/.exec(value);
  if (!stamp) throw new Error(`Invalid date-time: ${value}`);
  const [, y, m, d, hh, mm, ss, utc] = stamp;
  const dateTime = `${y}-${m}-${d}T${hh}:${mm}:${ss}${utc ? "Z" : ""}`;
  const tzid = property.params.TZID;
  return tzid && !utc ? { dateTime, timeZone: tzid } : { dateTime };
}

function mapStatus(value: string): string | undefined {
  const status = value.toLowerCase();
  return ["confirmed", "tentative", "cancelled"].includes(status) ? status : undefined;
}

function mapVisibility(value: string): string | undefined {
  const visibility = value.toLowerCase();
  return ["public", "private", "confidential"].includes(visibility) ? visibility : undefined;
}

function mailto(value: string): string {
  return value.replace(/^mailto:/i, "");
}

/**
 * Parse the first VEVENT. Nested components (VALARM) are skipped.
 */
export function parseFirstVEvent(text: string): calendar_v3.Schema$Event {
  const lines = unfold(text);
  const properties: Property[] = [];
  let depth = 0;
  let inEvent = false;
  let found = false;

  for (const line of lines) {
    if (!line.trim()) continue;
    const property = parseProperty(line);
    if (!property) continue;

    if (property.name === "BEGIN") {
      if (!inEvent && property.value.toUpperCase() === "VEVENT") {
        inEvent = true;
        depth = 0;
      } else if (inEvent) {
        depth++;
      }
      continue;
    }
    if (property.name === "END" && inEvent) {
      if (depth === 0) {
        found = true;
        break;
      }
      depth--;
      continue;
    }
    if (inEvent && depth === 0) properties.push(property);
  }

  if (!found) throw new Error("No complete VEVENT found in iCalendar data");

  const event: calendar_v3.Schema$Event = {};
  const recurrence: string[] = [];
  const attendees: calendar_v3.Schema$EventAttendee[] = [];

  for (const property of properties) {
    switch (property.name) {
      case "UID":
        event.iCalUID = property.value;
        break;
      case "SUMMARY":
        event.summary = unescapeText(property.value);
        break;
      case "DESCRIPTION":
        event.description = unescapeText(property.value);
        break;
      case "LOCATION":
        event.location = unescapeText(property.value);
        break;
      case "DTSTART":
        event.start = toEventDateTime(property);
        break;
      case "DTEND":
        event.end = toEventDateTime(property);
        break;
      case "RRULE":
      case "EXRULE":
      case "RDATE":
      case "EXDATE":
        recurrence.push(`${property.name}:${property.value}`);
        break;
      case "STATUS": {
        const status = mapStatus(property.value);
        if (status) event.status = status;
        break;
      }
      case "TRANSP":
        event.transparency = property.value.toUpperCase() === "TRANSPARENT" ? "transparent" : "opaque";
        break;
      case "CLASS": {
        const visibility = mapVisibility(property.value);
        if (visibility) event.visibility = visibility;
        break;
      }
      case "SEQUENCE": {
        const sequence = Number.parseInt(property.value, 10);
        if (Number.isFinite(sequence)) event.sequence = sequence;
        break;
      }
      case "ORGANIZER":
        event.organizer = {
          email: mailto(property.value),
          displayName: property.params.CN,
        };
        break;
      case "ATTENDEE":
        attendees.push({
          email: mailto(property.value),
          displayName: property.params.CN,
          optional: property.params.ROLE === "OPT-PARTICIPANT" ? true : undefined,
          responseStatus: mapPartStat(property.params.PARTSTAT),
        });
        break;
      default:
        break;
    }
  }

  if (!event.end && event.start) {
    event.end = event.start.date
      ? { date: addOneDay(event.start.date) }
      : { ...event.start };
  }
  if (recurrence.length > 0) event.recurrence = recurrence;
  if (attendees.length > 0) event.attendees = attendees;
  return event;
}

function mapPartStat(value: string | undefined): string | undefined {
  switch (value?.toUpperCase()) {
    case "ACCEPTED":
      return "accepted";
    case "DECLINED":
      return "declined";
    case "TENTATIVE":
      return "tentative";
    case "NEEDS-ACTION":
      return "needsAction";
    default:
      return undefined;
  }
}
