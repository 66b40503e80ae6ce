import { fail, ok, type OpResult } from "../result.js";
import type { SentEmail } from "../types.js";
import { validateEmailAddress } from "../validation.js";

export class EmailOutbox {
  private sent: SentEmail[] = [];

  constructor(private readonly context: { taskId: () => string; now: () => string }) {}

  sendEmail(recipient: string, subject: string, body: string): OpResult<SentEmail> {
    if (!recipient || !subject || !body) {
      return fail("VALIDATION", "Recipient, subject, and body are all required.");
    }
    if (!validateEmailAddress(recipient)) {
      return fail("VALIDATION", `Invalid email address '${recipient}'.`);
    }
    const email: SentEmail = {
      recipient: recipient.trim(),
      subject,
      body,
      sent_at: this.context.now(),
      task_id: this.context.taskId(),
    };
    this.sent.push(email);
    return ok(`Email sent successfully to ${email.recipient}.`, { ...email });
  }

  list(taskId?: string): SentEmail[] {
    const all = taskId === undefined ? this.sent : this.sent.filter(e => e.task_id === taskId);
    return all.map(e => ({ ...e }));
  }

  restore(sent: SentEmail[]): void {
    this.sent = sent.map(e => ({ ...e }));
  }
}
