/**
 * Google Calendar tools: calendars, events, sharing and free/busy.
 */

import { Type } from "@sinclair/typebox";
import type { calendar_v3 } from "googleapis";

import { formatErrorMessage } from "../google/errors.js";
import { parseFirstVEvent } from "../google/ical.js";
import {
  type AnyWorkspaceTool,
  defineTool,
  jsonResult,
  ToolInputError,
} from "./common.js";

export const EventDateTime = Type.Object(
  {
    dateTime: Type.Optional(
      Type.String({ description: "RFC 3339 timestamp, e.g. '2026-03-10T09:00:00+01:00'" }),
    ),
    date: Type.Optional(Type.String({ description: "All-day date, 'YYYY-MM-DD'" })),
    timeZone: Type.Optional(Type.String({ description: "IANA time zone, e.g. 'Europe/Paris'" })),
  },
  { additionalProperties: false },
);

export const Attendee = Type.Object(
  {
    email: Type.String({ minLength: 1 }),
    displayName: Type.Optional(Type.String()),
    optional: Type.Optional(Type.Boolean()),
    responseStatus: Type.Optional(
      Type.Union([
        Type.Literal("needsAction"),
        Type.Literal("declined"),
        Type.Literal("tentative"),
        Type.Literal("accepted"),
      ]),
    ),
  },
  { additionalProperties: false },
);

const Reminders = Type.Object(
  {
    useDefault: Type.Boolean(),
    overrides: Type.Optional(
      Type.Array(
        Type.Object(
          {
            method: Type.Union([Type.Literal("email"), Type.Literal("popup")]),
            minutes: Type.Integer({ minimum: 0 }),
          },
          { additionalProperties: false },
        ),
      ),
    ),
  },
  { additionalProperties: false },
);

const Visibility = Type.Union([
  Type.Literal("default"),
  Type.Literal("public"),
  Type.Literal("private"),
  Type.Literal("confidential"),
]);

const Transparency = Type.Union([Type.Literal("opaque"), Type.Literal("transparent")]);

const SendNotifications = Type.Optional(
  Type.Boolean({ description: "Email guests about the change (default: false)" }),
);

/**
 * Map a notification flag onto the Calendar API's `sendUpdates`.
 */
export function sendUpdates(notify: boolean | undefined, fallback: boolean): "all" | "none" {
  return (notify ?? fallback) ? "all" : "none";
}

function assertTime(label: string, time: { dateTime?: string; date?: string }): void {
  if (!time.dateTime && !time.date) {
    throw new ToolInputError(`${label} needs either dateTime or date`);
  }
}

function parseImportedEvent(icalData: string): calendar_v3.Schema$Event {
  let event: calendar_v3.Schema$Event;
  try {
    event = parseFirstVEvent(icalData);
  } catch (err) {
    throw new ToolInputError(`Invalid iCalendar data: ${formatErrorMessage(err)}`);
  }
  if (!event.iCalUID) {
    throw new ToolInputError("Invalid iCalendar data: the event has no UID");
  }
  if (!event.start) {
    throw new ToolInputError("Invalid iCalendar data: the event has no DTSTART");
  }
  return event;
}

const CalendarCreateSchema = Type.Object(
  {
    summary: Type.String({ minLength: 1, description: "Calendar title" }),
    description: Type.Optional(Type.String()),
    location: Type.Optional(Type.String()),
    timeZone: Type.Optional(Type.String({ description: "IANA time zone" })),
  },
  { additionalProperties: false },
);

const CalendarIdSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1, description: "Calendar ID, or 'primary'" }),
  },
  { additionalProperties: false },
);

const CalendarUpdateSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    summary: Type.Optional(Type.String()),
    description: Type.Optional(Type.String()),
    location: Type.Optional(Type.String()),
    timeZone: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const CalendarListSchema = Type.Object(
  {
    showHidden: Type.Optional(Type.Boolean()),
    minAccessRole: Type.Optional(
      Type.Union([
        Type.Literal("freeBusyReader"),
        Type.Literal("reader"),
        Type.Literal("writer"),
        Type.Literal("owner"),
      ]),
    ),
  },
  { additionalProperties: false },
);

const CalendarShareSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    scopeType: Type.Union(
      [Type.Literal("default"), Type.Literal("user"), Type.Literal("group"), Type.Literal("domain")],
      { description: "Who the rule applies to" },
    ),
    role: Type.Union([
      Type.Literal("none"),
      Type.Literal("freeBusyReader"),
      Type.Literal("reader"),
      Type.Literal("writer"),
      Type.Literal("owner"),
    ]),
    scopeValue: Type.Optional(
      Type.String({ description: "Email or domain; omitted for scopeType 'default'" }),
    ),
  },
  { additionalProperties: false },
);

const EventCreateSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    summary: Type.String({ minLength: 1 }),
    start: EventDateTime,
    end: EventDateTime,
    description: Type.Optional(Type.String()),
    location: Type.Optional(Type.String()),
    attendees: Type.Optional(Type.Array(Attendee)),
    recurrence: Type.Optional(
      Type.Array(Type.String(), { description: "RRULE/EXDATE lines, e.g. 'RRULE:FREQ=WEEKLY'" }),
    ),
    colorId: Type.Optional(Type.String()),
    visibility: Type.Optional(Visibility),
    transparency: Type.Optional(Transparency),
    reminders: Type.Optional(Reminders),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const EventGetSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    eventId: Type.String({ minLength: 1 }),
    timeZone: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const EventUpdateSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    eventId: Type.String({ minLength: 1 }),
    summary: Type.Optional(Type.String()),
    description: Type.Optional(Type.String()),
    location: Type.Optional(Type.String()),
    start: Type.Optional(EventDateTime),
    end: Type.Optional(EventDateTime),
    attendees: Type.Optional(Type.Array(Attendee)),
    recurrence: Type.Optional(Type.Array(Type.String())),
    colorId: Type.Optional(Type.String()),
    visibility: Type.Optional(Visibility),
    transparency: Type.Optional(Transparency),
    status: Type.Optional(
      Type.Union([Type.Literal("confirmed"), Type.Literal("tentative"), Type.Literal("cancelled")]),
    ),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const EventDeleteSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    eventId: Type.String({ minLength: 1 }),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const EventListSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    timeMin: Type.Optional(Type.String({ description: "Lower bound (RFC 3339) for event end" })),
    timeMax: Type.Optional(Type.String({ description: "Upper bound (RFC 3339) for event start" })),
    query: Type.Optional(Type.String({ description: "Free text search" })),
    maxResults: Type.Optional(Type.Integer({ minimum: 1, maximum: 2500 })),
    pageToken: Type.Optional(Type.String()),
    singleEvents: Type.Optional(Type.Boolean({ description: "Expand recurring events" })),
    orderBy: Type.Optional(Type.Union([Type.Literal("startTime"), Type.Literal("updated")])),
    showDeleted: Type.Optional(Type.Boolean()),
    timeZone: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const EventQuickAddSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    text: Type.String({ minLength: 1, description: "e.g. 'Lunch with Sam tomorrow at noon'" }),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const EventMoveSchema = Type.Object(
  {
    sourceCalendarId: Type.String({ minLength: 1 }),
    destinationCalendarId: Type.String({ minLength: 1 }),
    eventId: Type.String({ minLength: 1 }),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const EventImportSchema = Type.Object(
  {
    calendarId: Type.String({ minLength: 1 }),
    icalData: Type.String({ minLength: 1, description: "iCalendar text with at least one VEVENT" }),
  },
  { additionalProperties: false },
);

const FreeBusySchema = Type.Object(
  {
    timeMin: Type.String({ minLength: 1 }),
    timeMax: Type.String({ minLength: 1 }),
    calendarIds: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    timeZone: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export function createCalendarTools(): AnyWorkspaceTool[] {
  return [
    defineTool({
      name: "calendar_create",
      label: "Create calendar",
      description: "Create a secondary calendar.",
      parameters: CalendarCreateSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.calendars.insert({
          requestBody: {
            summary: params.summary,
            description: params.description,
            location: params.location,
            timeZone: params.timeZone,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "calendar_get",
      label: "Get calendar",
      description: "Fetch a calendar's metadata.",
      parameters: CalendarIdSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.calendars.get({ calendarId: params.calendarId });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "calendar_update",
      label: "Update calendar",
      description: "Change a calendar's title, description, location or time zone.",
      parameters: CalendarUpdateSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.calendars.patch({
          calendarId: params.calendarId,
          requestBody: {
            summary: params.summary,
            description: params.description,
            location: params.location,
            timeZone: params.timeZone,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "calendar_delete",
      label: "Delete calendar",
      description: "Delete a secondary calendar.",
      parameters: CalendarIdSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        await calendar.calendars.delete({ calendarId: params.calendarId });
        return jsonResult({ ok: true, calendarId: params.calendarId });
      },
    }),
    defineTool({
      name: "calendar_list",
      label: "List calendars",
      description: "List the calendars on the user's calendar list.",
      parameters: CalendarListSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.calendarList.list({
          showHidden: params.showHidden,
          minAccessRole: params.minAccessRole,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "calendar_share",
      label: "Share calendar",
      description: "Add an access rule to a calendar.",
      parameters: CalendarShareSchema,
      execute: async (_id, params, ctx) => {
        if (params.scopeType !== "default" && !params.scopeValue) {
          throw new ToolInputError(`scopeValue is required for scopeType '${params.scopeType}'`);
        }
        const calendar = await ctx.service("calendar");
        const res = await calendar.acl.insert({
          calendarId: params.calendarId,
          requestBody: {
            role: params.role,
            scope: { type: params.scopeType, value: params.scopeValue },
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_create",
      label: "Create event",
      description: `Create an event.

Examples:
- Timed: { calendarId: "primary", summary: "Sync", start: { dateTime: "2026-03-10T09:00:00Z" }, end: { dateTime: "2026-03-10T09:30:00Z" } }
- All day: { calendarId: "primary", summary: "Offsite", start: { date: "2026-03-12" }, end: { date: "2026-03-13" } }`,
      parameters: EventCreateSchema,
      execute: async (_id, params, ctx) => {
        assertTime("start", params.start);
        assertTime("end", params.end);
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.insert({
          calendarId: params.calendarId,
          sendUpdates: sendUpdates(params.sendNotifications, false),
          requestBody: {
            summary: params.summary,
            start: params.start,
            end: params.end,
            description: params.description,
            location: params.location,
            attendees: params.attendees,
            recurrence: params.recurrence,
            colorId: params.colorId,
            visibility: params.visibility,
            transparency: params.transparency,
            reminders: params.reminders,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_get",
      label: "Get event",
      description: "Fetch a single event.",
      parameters: EventGetSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.get({
          calendarId: params.calendarId,
          eventId: params.eventId,
          timeZone: params.timeZone,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_update",
      label: "Update event",
      description: "Change fields of an event. Omitted fields are left as they are.",
      parameters: EventUpdateSchema,
      execute: async (_id, params, ctx) => {
        if (params.start) assertTime("start", params.start);
        if (params.end) assertTime("end", params.end);
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.patch({
          calendarId: params.calendarId,
          eventId: params.eventId,
          sendUpdates: sendUpdates(params.sendNotifications, false),
          requestBody: {
            summary: params.summary,
            description: params.description,
            location: params.location,
            start: params.start,
            end: params.end,
            attendees: params.attendees,
            recurrence: params.recurrence,
            colorId: params.colorId,
            visibility: params.visibility,
            transparency: params.transparency,
            status: params.status,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_delete",
      label: "Delete event",
      description: "Delete an event.",
      parameters: EventDeleteSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        await calendar.events.delete({
          calendarId: params.calendarId,
          eventId: params.eventId,
          sendUpdates: sendUpdates(params.sendNotifications, false),
        });
        return jsonResult({ ok: true, calendarId: params.calendarId, eventId: params.eventId });
      },
    }),
    defineTool({
      name: "event_list",
      label: "List events",
      description: "List events in a calendar, optionally within a time window or matching text.",
      parameters: EventListSchema,
      execute: async (_id, params, ctx) => {
        if (params.orderBy === "startTime" && params.singleEvents !== true) {
          throw new ToolInputError("orderBy 'startTime' requires singleEvents: true");
        }
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.list({
          calendarId: params.calendarId,
          timeMin: params.timeMin,
          timeMax: params.timeMax,
          q: params.query,
          maxResults: params.maxResults,
          pageToken: params.pageToken,
          singleEvents: params.singleEvents,
          orderBy: params.orderBy,
          showDeleted: params.showDeleted,
          timeZone: params.timeZone,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_quick_add",
      label: "Quick add event",
      description: "Create an event from a natural-language sentence.",
      parameters: EventQuickAddSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.quickAdd({
          calendarId: params.calendarId,
          text: params.text,
          sendUpdates: sendUpdates(params.sendNotifications, false),
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_move",
      label: "Move event",
      description: "Move an event to another calendar.",
      parameters: EventMoveSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.move({
          calendarId: params.sourceCalendarId,
          eventId: params.eventId,
          destination: params.destinationCalendarId,
          sendUpdates: sendUpdates(params.sendNotifications, false),
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "event_import",
      label: "Import event",
      description: "Import the first VEVENT of an iCalendar document as a private copy.",
      parameters: EventImportSchema,
      execute: async (_id, params, ctx) => {
        const event = parseImportedEvent(params.icalData);
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.import({
          calendarId: params.calendarId,
          requestBody: event,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "calendar_free_busy",
      label: "Free/busy",
      description: "Report busy intervals for calendars in a time window.",
      parameters: FreeBusySchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.freebusy.query({
          requestBody: {
            timeMin: params.timeMin,
            timeMax: params.timeMax,
            timeZone: params.timeZone,
            items: params.calendarIds.map((id) => ({ id })),
          },
        });
        return jsonResult(res.data);
      },
    }),
  ];
}
