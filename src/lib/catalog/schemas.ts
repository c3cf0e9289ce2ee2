// ---------------------------------------------------------------------------
// Course Catalog — Zod Validation Schemas
// One export row → one session draft; event details supplied alongside.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { parseCalendarDate, parseTimeOfDay } from "./calendar";
import { parseSkillTier } from "./skill-tiers";
import type { Category, CourseSession, EventSession } from "./types";

/** Columns every export row must carry. `Day` is accepted as an optional extra. */
export const SESSION_COLUMNS = [
	"Name",
	"Type",
	"Skill Level",
	"Venue",
	"Start Date",
	"Time",
	"Duration Text",
	"Active Participants",
] as const;

const CATEGORY_ALIASES = new Map<string, Category>([
	["adult", "AdultCourse"],
	["adults", "AdultCourse"],
	["adultcourse", "AdultCourse"],
	["adultcourses", "AdultCourse"],
	["junior", "JuniorCourse"],
	["juniors", "JuniorCourse"],
	["juniorcourse", "JuniorCourse"],
	["juniorcourses", "JuniorCourse"],
	["event", "Event"],
	["events", "Event"],
]);

/** Case-insensitive; spaces, hyphens and underscores are ignored. */
export function parseCategory(raw: string): Category | null {
	const key = raw.trim().toLowerCase().replace(/[\s_-]+/g, "");
	return CATEGORY_ALIASES.get(key) ?? null;
}

const text = (column: string) =>
	z.string({
		required_error: `${column} is required`,
		invalid_type_error: `${column} must be text`,
	});

const nonBlank = (column: string) => text(column).trim().min(1, `${column} must not be blank`);

/** A validated row before it is given its position in the input. */
export type SessionDraft = Omit<CourseSession, "rowIndex"> | Omit<EventSession, "rowIndex">;

export const SessionRowSchema = z
	.object({
		Name: nonBlank("Name"),
		Type: text("Type").transform((value, ctx) => {
			const category = parseCategory(value);
			if (category === null) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Type "${value.trim()}" is not recognized`,
				});
				return z.NEVER;
			}
			return category;
		}),
		"Skill Level": text("Skill Level").optional(),
		Venue: nonBlank("Venue"),
		"Start Date": text("Start Date").transform((value, ctx) => {
			const date = parseCalendarDate(value);
			if (date === null) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Start Date "${value.trim()}" is not a valid date`,
				});
				return z.NEVER;
			}
			return date;
		}),
		Time: text("Time").transform((value, ctx) => {
			const time = parseTimeOfDay(value);
			if (time === null) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Time "${value.trim()}" is not a valid time`,
				});
				return z.NEVER;
			}
			return time;
		}),
		"Duration Text": text("Duration Text").default(""),
		"Active Participants": text("Active Participants").transform((value, ctx) => {
			const trimmed = value.trim();
			if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Active Participants "${trimmed}" is not a non-negative integer`,
				});
				return z.NEVER;
			}
			return Number.parseInt(trimmed, 10);
		}),
		Day: text("Day").optional(),
	})
	.transform((row, ctx): SessionDraft => {
		const rawTier = row["Skill Level"]?.trim() ?? "";
		const day = row.Day?.trim() || null;
		const fields = {
			name: row.Name,
			venue: row.Venue,
			startDate: row["Start Date"],
			time: row.Time,
			durationText: row["Duration Text"],
			participantCount: row["Active Participants"],
			day,
		};

		if (row.Type === "Event") {
			if (rawTier !== "") {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: "Skill Level must be empty for events",
				});
				return z.NEVER;
			}
			return { ...fields, category: "Event", skillTier: null };
		}

		if (rawTier === "") {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "Skill Level is required for courses",
			});
			return z.NEVER;
		}
		const skillTier = parseSkillTier(rawTier);
		if (skillTier === null) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Skill Level "${rawTier}" is not recognized`,
			});
			return z.NEVER;
		}
		return { ...fields, category: row.Type, skillTier };
	});

/** Externally supplied details for one event group, matched by event name. */
export const EventDetailsSchema = z.object({
	name: z.string().trim().min(1),
	description: z.string().trim().min(1).optional(),
	imageUrl: z.string().url().optional(),
	/** Opaque booking link, rendered as-is */
	bookingUrl: z.string().url().optional(),
});

export const EventDetailsListSchema = z.array(EventDetailsSchema);

export type EventDetails = z.infer<typeof EventDetailsSchema>;
