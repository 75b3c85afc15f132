import { Resend } from "resend";
import { buildCaseKey } from "./listing";
import type { RunResult } from "./types";

export interface AlertSettings {
  apiKey: string;
  to: string;
  from: string;
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function listedDays(result: RunResult): string[] {
  const days: string[] = [];
  if (result.is_listed_today) days.push("Today");
  if (result.is_listed_tomorrow) days.push("Tomorrow");
  return days;
}

export function buildListingAlertHtml(result: RunResult): string {
  const details = result.listing_details;
  const caseLabel =
    buildCaseKey(result.inputs.case_type, result.inputs.case_number, result.inputs.year, result.case_overview) ??
    result.inputs.cnr ??
    "Unknown case";
  const cell = (v: string | null | undefined) =>
    `<td style="padding: 8px; border: 1px solid #ddd;">${escapeHtml(v || "—")}</td>`;

  const rows = listedDays(result)
    .map(
      (day) => `
    <tr>
      ${cell(day)}
      ${cell(details?.serial)}
      ${cell(details?.court ?? result.case_overview?.court_name)}
      ${cell(details?.case_text ?? caseLabel)}
      ${cell(details?.purpose)}
    </tr>`
    )
    .join("");

  const note = details
    ? ""
    : `<p style="color: #666; font-size: 13px;">Matched on a hearing date from the case status page; the serial number needs the cause list.</p>`;

  return `
    <div style="font-family: sans-serif; max-width: 600px;">
      <h2 style="color: #1a1a2e;">Case Listed</h2>
      <p><strong>Case:</strong> ${escapeHtml(caseLabel)}</p>
      <table style="border-collapse: collapse; width: 100%; margin: 16px 0;">
        <thead>
          <tr style="background: #f5f5f5;">
            <th style="padding: 8px; border: 1px solid #ddd; text-align: left;">Day</th>
            <th style="padding: 8px; border: 1px solid #ddd; text-align: left;">Serial</th>
            <th style="padding: 8px; border: 1px solid #ddd; text-align: left;">Court</th>
            <th style="padding: 8px; border: 1px solid #ddd; text-align: left;">Case</th>
            <th style="padding: 8px; border: 1px solid #ddd; text-align: left;">Purpose</th>
          </tr>
        </thead>
        <tbody>
          ${rows}
        </tbody>
      </table>
      ${note}
    </div>
  `;
}

/** Sends one alert when the case is listed today or tomorrow. Returns false when there is nothing to send. */
export async function sendListingAlert(settings: AlertSettings, result: RunResult): Promise<boolean> {
  const days = listedDays(result);
  if (days.length === 0) return false;

  const resend = new Resend(settings.apiKey);
  const subject = `[Cause List] ${result.inputs.cnr ?? result.listing_details?.case_text ?? "Case"} listed ${days
    .join(" & ")
    .toLowerCase()}`;

  const sent = await resend.emails.send({
    from: settings.from,
    to: [settings.to],
    subject,
    html: buildListingAlertHtml(result),
  });

  if (sent.error) {
    console.error("[sendListingAlert] Resend error:", sent.error);
    throw new Error(`Email failed: ${sent.error.message}`);
  }

  console.log("[sendListingAlert] Sent successfully, id:", sent.data?.id);
  return true;
}
