/**
 * Google Meet tools. A meeting is an event on the primary calendar that
 * carries a Meet conference.
 */

import { randomUUID } from "node:crypto";

import { Type } from "@sinclair/typebox";
import type { calendar_v3 } from "googleapis";

import { Attendee, sendUpdates } from "./calendar-tools.js";
import { type AnyWorkspaceTool, defineTool, jsonResult, ToolInputError } from "./common.js";

const CALENDAR_ID = "primary";
const HOUR_MS = 60 * 60 * 1000;

const MeetingId = Type.String({ minLength: 1, description: "Calendar event ID of the meeting" });

const SendNotifications = Type.Optional(
  Type.Boolean({ description: "Email guests about the change (default: true)" }),
);

const ResponseStatus = Type.Union([
  Type.Literal("needsAction"),
  Type.Literal("declined"),
  Type.Literal("tentative"),
  Type.Literal("accepted"),
]);

const CreateSchema = Type.Object(
  {
    title: Type.String({ minLength: 1 }),
    startTime: Type.String({ minLength: 1, description: "RFC 3339 start, e.g. '2026-03-10T09:00:00Z'" }),
    endTime: Type.Optional(Type.String({ description: "Defaults to one hour after start" })),
    description: Type.Optional(Type.String()),
    timeZone: Type.Optional(Type.String({ description: "IANA time zone (default: UTC)" })),
    attendees: Type.Optional(Type.Array(Attendee)),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const MeetingIdSchema = Type.Object({ meetingId: MeetingId }, { additionalProperties: false });

const UpdateSchema = Type.Object(
  {
    meetingId: MeetingId,
    title: Type.Optional(Type.String({ minLength: 1 })),
    description: Type.Optional(Type.String()),
    startTime: Type.Optional(Type.String({ minLength: 1 })),
    endTime: Type.Optional(Type.String({ minLength: 1 })),
    timeZone: Type.Optional(Type.String()),
    attendees: Type.Optional(Type.Array(Attendee)),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const DeleteSchema = Type.Object(
  { meetingId: MeetingId, sendNotifications: SendNotifications },
  { additionalProperties: false },
);

const ListSchema = Type.Object(
  {
    timeMin: Type.Optional(Type.String()),
    timeMax: Type.Optional(Type.String()),
    maxResults: Type.Optional(Type.Integer({ minimum: 1, maximum: 2500 })),
    pageToken: Type.Optional(Type.String()),
    query: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const AddAttendeeSchema = Type.Object(
  { meetingId: MeetingId, attendee: Attendee, sendNotifications: SendNotifications },
  { additionalProperties: false },
);

const RemoveAttendeeSchema = Type.Object(
  {
    meetingId: MeetingId,
    email: Type.String({ minLength: 1 }),
    sendNotifications: SendNotifications,
  },
  { additionalProperties: false },
);

const AttendeeStatusSchema = Type.Object(
  { meetingId: MeetingId, email: Type.String({ minLength: 1 }), responseStatus: ResponseStatus },
  { additionalProperties: false },
);

const ShareSchema = Type.Object(
  {
    meetingId: MeetingId,
    rule: Type.Object(
      {
        emailAddress: Type.String({ minLength: 1 }),
        role: Type.Union([Type.Literal("reader"), Type.Literal("writer")], {
          description: "'reader' invites; 'writer' invites and lets guests edit the event",
        }),
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

const LOCAL_TIME =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?$/;

/**
 * One hour after an RFC 3339 time, keeping its offset (or lack of one).
 */
export function oneHourAfter(startTime: string): string {
  const match = LOCAL_TIME.exec(startTime);
  const local = match?.[1];
  const wall = local ? Date.parse(`${local}Z`) : Number.NaN;
  if (!local || Number.isNaN(wall)) {
    throw new ToolInputError(`Invalid startTime: ${startTime}`);
  }
  return `${new Date(wall + HOUR_MS).toISOString().slice(0, 19)}${match?.[2] ?? ""}`;
}

function sameEmail(a: string | null | undefined, b: string): boolean {
  return (a ?? "").toLowerCase() === b.toLowerCase();
}

function hasConference(event: calendar_v3.Schema$Event): boolean {
  return Boolean(event.conferenceData || event.hangoutLink);
}

/**
 * Replace or add an attendee, matched by email.
 */
function upsertAttendee(
  attendees: calendar_v3.Schema$EventAttendee[],
  attendee: calendar_v3.Schema$EventAttendee,
): calendar_v3.Schema$EventAttendee[] {
  const email = attendee.email ?? "";
  const rest = attendees.filter((existing) => !sameEmail(existing.email, email));
  return [...rest, attendee];
}

export function createMeetTools(): AnyWorkspaceTool[] {
  async function getMeeting(calendar: calendar_v3.Calendar, meetingId: string) {
    const res = await calendar.events.get({ calendarId: CALENDAR_ID, eventId: meetingId });
    return res.data;
  }

  async function patchMeeting(
    calendar: calendar_v3.Calendar,
    meetingId: string,
    requestBody: calendar_v3.Schema$Event,
    notify: "all" | "none",
  ) {
    const res = await calendar.events.patch({
      calendarId: CALENDAR_ID,
      eventId: meetingId,
      conferenceDataVersion: 1,
      sendUpdates: notify,
      requestBody,
    });
    return res.data;
  }

  return [
    defineTool({
      name: "meet_create",
      label: "Create meeting",
      description: "Schedule a meeting with a Google Meet link on the primary calendar.",
      parameters: CreateSchema,
      execute: async (_id, params, ctx) => {
        const timeZone = params.timeZone ?? "UTC";
        const endTime = params.endTime ?? oneHourAfter(params.startTime);
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.insert({
          calendarId: CALENDAR_ID,
          conferenceDataVersion: 1,
          sendUpdates: sendUpdates(params.sendNotifications, true),
          requestBody: {
            summary: params.title,
            description: params.description,
            start: { dateTime: params.startTime, timeZone },
            end: { dateTime: endTime, timeZone },
            attendees: params.attendees,
            conferenceData: {
              createRequest: {
                requestId: randomUUID(),
                conferenceSolutionKey: { type: "hangoutsMeet" },
              },
            },
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "meet_get",
      label: "Get meeting",
      description: "Fetch a meeting.",
      parameters: MeetingIdSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        return jsonResult(await getMeeting(calendar, params.meetingId));
      },
    }),
    defineTool({
      name: "meet_update",
      label: "Update meeting",
      description: "Change a meeting's title, description, times or guests.",
      parameters: UpdateSchema,
      execute: async (_id, params, ctx) => {
        const requestBody: calendar_v3.Schema$Event = {
          summary: params.title,
          description: params.description,
          attendees: params.attendees,
        };
        if (params.startTime) {
          requestBody.start = { dateTime: params.startTime, timeZone: params.timeZone };
        }
        if (params.endTime) {
          requestBody.end = { dateTime: params.endTime, timeZone: params.timeZone };
        }
        const calendar = await ctx.service("calendar");
        const updated = await patchMeeting(
          calendar,
          params.meetingId,
          requestBody,
          sendUpdates(params.sendNotifications, true),
        );
        return jsonResult(updated);
      },
    }),
    defineTool({
      name: "meet_delete",
      label: "Delete meeting",
      description: "Cancel and delete a meeting.",
      parameters: DeleteSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        await calendar.events.delete({
          calendarId: CALENDAR_ID,
          eventId: params.meetingId,
          sendUpdates: sendUpdates(params.sendNotifications, true),
        });
        return jsonResult({ ok: true, meetingId: params.meetingId });
      },
    }),
    defineTool({
      name: "meet_list",
      label: "List meetings",
      description: "List upcoming events that have a Meet conference.",
      parameters: ListSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const res = await calendar.events.list({
          calendarId: CALENDAR_ID,
          timeMin: params.timeMin,
          timeMax: params.timeMax,
          maxResults: params.maxResults ?? 20,
          pageToken: params.pageToken,
          q: params.query,
          singleEvents: true,
          orderBy: "startTime",
        });
        return jsonResult({
          items: (res.data.items ?? []).filter(hasConference),
          nextPageToken: res.data.nextPageToken ?? null,
        });
      },
    }),
    defineTool({
      name: "meet_add_attendee",
      label: "Add attendee",
      description: "Invite someone to a meeting.",
      parameters: AddAttendeeSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const meeting = await getMeeting(calendar, params.meetingId);
        const attendees = upsertAttendee(meeting.attendees ?? [], params.attendee);
        const updated = await patchMeeting(
          calendar,
          params.meetingId,
          { attendees },
          sendUpdates(params.sendNotifications, true),
        );
        return jsonResult(updated);
      },
    }),
    defineTool({
      name: "meet_remove_attendee",
      label: "Remove attendee",
      description: "Remove someone from a meeting's guest list.",
      parameters: RemoveAttendeeSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const meeting = await getMeeting(calendar, params.meetingId);
        const current = meeting.attendees ?? [];
        const attendees = current.filter((attendee) => !sameEmail(attendee.email, params.email));
        if (attendees.length === current.length) {
          throw new ToolInputError(`${params.email} is not an attendee of ${params.meetingId}`);
        }
        const updated = await patchMeeting(
          calendar,
          params.meetingId,
          { attendees },
          sendUpdates(params.sendNotifications, true),
        );
        return jsonResult(updated);
      },
    }),
    defineTool({
      name: "meet_update_attendee_status",
      label: "Update attendee status",
      description: "Record an attendee's response.",
      parameters: AttendeeStatusSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const meeting = await getMeeting(calendar, params.meetingId);
        const current = meeting.attendees ?? [];
        if (!current.some((attendee) => sameEmail(attendee.email, params.email))) {
          throw new ToolInputError(`${params.email} is not an attendee of ${params.meetingId}`);
        }
        const attendees = current.map((attendee) =>
          sameEmail(attendee.email, params.email)
            ? { ...attendee, responseStatus: params.responseStatus }
            : attendee,
        );
        const updated = await patchMeeting(calendar, params.meetingId, { attendees }, "none");
        return jsonResult(updated);
      },
    }),
    defineTool({
      name: "meet_get_join_info",
      label: "Get join info",
      description: "Return the Meet link and dial-in entry points of a meeting.",
      parameters: MeetingIdSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const meeting = await getMeeting(calendar, params.meetingId);
        return jsonResult({
          meetingId: params.meetingId,
          hangoutLink: meeting.hangoutLink ?? null,
          conferenceId: meeting.conferenceData?.conferenceId ?? null,
          entryPoints: meeting.conferenceData?.entryPoints ?? [],
        });
      },
    }),
    defineTool({
      name: "meet_share",
      label: "Share meeting",
      description: "Invite someone; 'writer' also lets guests modify the event.",
      parameters: ShareSchema,
      execute: async (_id, params, ctx) => {
        const calendar = await ctx.service("calendar");
        const meeting = await getMeeting(calendar, params.meetingId);
        const existing = (meeting.attendees ?? []).find((attendee) =>
          sameEmail(attendee.email, params.rule.emailAddress),
        );
        const attendees = upsertAttendee(
          meeting.attendees ?? [],
          existing ?? { email: params.rule.emailAddress },
        );
        const requestBody: calendar_v3.Schema$Event = { attendees };
        if (params.rule.role === "writer") requestBody.guestsCanModify = true;
        const updated = await patchMeeting(calendar, params.meetingId, requestBody, "all");
        return jsonResult(updated);
      },
    }),
  ];
}
