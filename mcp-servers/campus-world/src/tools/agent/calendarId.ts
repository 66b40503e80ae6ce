import { z } from "zod";

export const calendarId = z.string()
  .describe("'self' for your own calendar, 'club_<id>' for a club, 'advisor_<id>' for an advisor");
