import type { FieldEntry } from '../../db/schema';
import { formatFileSize } from '../../lib/format';

export interface NotificationInput {
    keyName: string;
    fields: readonly FieldEntry[];
    files: readonly { originalFilename: string; fileSize: number }[];
    receivedAt: number;
    sourceIp: string | null;
    dashboardUrl?: string;
}

export interface RenderedNotification {
    subject: string;
    text: string;
    html: string;
}

const RULE = '-'.repeat(50);

function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/** The subject is a single header line, so whitespace runs collapse to one space. */
function subjectFor(keyName: string): string {
    return `New Form Submission - ${keyName.replace(/\s+/g, ' ').trim()}`;
}

/** Plain-text body: one `name:` line and its value per field, then files and metadata. */
export function renderText(input: NotificationInput): string {
    const lines: string[] = ['New Form Submission', `From: ${input.keyName}`, RULE, ''];

    for (const field of input.fields) {
        lines.push(`${field.name}:`, field.value, '');
    }

    if (input.files.length > 0) {
        lines.push(`Attached Files (${input.files.length}):`);
        for (const file of input.files) {
            lines.push(`- ${file.originalFilename} (${formatFileSize(file.fileSize)})`);
        }
        lines.push('');
    }

    lines.push(RULE);
    lines.push(`Received: ${new Date(input.receivedAt).toISOString()}`);
    lines.push(`Source IP: ${input.sourceIp ?? 'unknown'}`);
    if (input.dashboardUrl) {
        lines.push(`View dashboard: ${input.dashboardUrl}`);
    }

    return `${lines.join('\n')}\n`;
}

/**
 * HTML body with the same content as the text part. Every
 * client-supplied string is escaped.
 */
export function renderHtml(input: NotificationInput): string {
    const fieldBlocks = input.fields.map((field) => `
        <div style="background:#fff;padding:12px 15px;margin-bottom:12px;border-left:4px solid #667eea;border-radius:5px;">
            <div style="font-weight:600;color:#667eea;font-size:12px;text-transform:uppercase;">${escapeHtml(field.name)}</div>
            <div style="color:#333;font-size:14px;white-space:pre-wrap;word-wrap:break-word;">${escapeHtml(field.value)}</div>
        </div>`).join('');

    const fileBlock = input.files.length === 0 ? '' : `
        <h3 style="color:#667eea;">Attached Files</h3>
        <ul>${input.files.map((file) =>
        `<li><strong>${escapeHtml(file.originalFilename)}</strong> (${formatFileSize(file.fileSize)})</li>`).join('')}
        </ul>`;

    const dashboardLink = input.dashboardUrl
        ? `<p><a href="${escapeHtml(input.dashboardUrl)}" style="color:#667eea;">View Dashboard</a></p>`
        : '';

    return `<!DOCTYPE html>
<html>
<body style="font-family:-apple-system,'Segoe UI',Roboto,Arial,sans-serif;line-height:1.6;color:#333;max-width:600px;margin:0 auto;padding:20px;">
    <div style="background:#667eea;color:#fff;padding:24px;border-radius:10px 10px 0 0;text-align:center;">
        <h1 style="margin:0;font-size:22px;">New Form Submission</h1>
        <p style="margin:8px 0 0 0;">From: ${escapeHtml(input.keyName)}</p>
    </div>
    <div style="background:#f8f9fa;padding:24px;border-radius:0 0 10px 10px;">${fieldBlocks}${fileBlock}
    </div>
    <div style="text-align:center;margin-top:24px;color:#666;font-size:12px;">
        <p>Received ${escapeHtml(new Date(input.receivedAt).toISOString())} from ${escapeHtml(input.sourceIp ?? 'unknown')}</p>
        ${dashboardLink}
    </div>
</body>
</html>
`;
}

/**
 * Renders the notification for one submission. Output depends only on
 * the input: fields appear in submission order with names and values
 * unchanged in the text part, and HTML-escaped in the HTML part.
 */
export function renderNotification(input: NotificationInput): RenderedNotification {
    return {
        subject: subjectFor(input.keyName),
        text: renderText(input),
        html: renderHtml(input),
    };
}
