import type { RenderFn } from '../types/ports.js';
import type {
    AttachmentsStyle,
    MessageKind,
    OutboundPayload,
    SourceAttachment,
    SourceEmbed,
    SourceMessage,
} from '../types/relay.js';

const KIND_HEADINGS: Record<MessageKind, string> = {
    message: '💬 <b>New message</b>',
    pinned: '📌 <b>Pinned message</b>',
    forum_thread: '🧵 <b>New forum thread</b>',
};

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp'];
const SOURCE_LINK_BASE = 'https://discord.com/channels';

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function attachmentUrl(attachment: SourceAttachment): string {
    return (attachment.url || attachment.proxyUrl || '').trim();
}

function isImage(attachment: SourceAttachment): boolean {
    const filename = (attachment.filename ?? '').toLowerCase();
    if (IMAGE_EXTENSIONS.some((ext) => filename.endsWith(ext))) return true;
    return (attachment.contentType ?? '').toLowerCase().startsWith('image/');
}

function renderEmbed(embed: SourceEmbed): string | null {
    const parts = [embed.title, embed.description, embed.url]
        .map((part) => (part ?? '').trim())
        .filter(Boolean);
    return parts.length > 0 ? escapeHtml(parts.join('\n')) : null;
}

function renderAttachments(attachments: readonly SourceAttachment[], style: AttachmentsStyle): string | null {
    const lines: string[] = [];
    attachments.forEach((attachment, index) => {
        const url = attachmentUrl(attachment);
        const filename = (attachment.filename ?? '').trim();
        if (style === 'links') {
            lines.push(`• ${escapeHtml(`${filename || `Attachment ${index + 1}`}: ${url}`)}`);
        } else {
            const parts = [filename, (attachment.contentType ?? '').trim(), url].filter(Boolean);
            lines.push(`• ${escapeHtml(parts.join(' • '))}`);
        }
    });
    if (lines.length === 0) return null;

    const header = style === 'links' ? '🔗 <b>Attachment links</b>' : '📎 <b>Attachments</b>';
    return [header, ...lines].join('\n');
}

function sourceLink(message: SourceMessage): string {
    const guild = message.guildId ?? '@me';
    return `${SOURCE_LINK_BASE}/${guild}/${message.channelId}/${message.id}`;
}

/**
 * Split rendered text into chunks of at most `maxLength` characters, on line
 * boundaries where possible. Lines that are longer on their own are cut.
 */
export function chunkText(text: string, maxLength: number): string[] {
    const limit = Math.max(1, Math.floor(maxLength));
    const chunks: string[] = [];
    let current = '';

    const flush = (): void => {
        if (current) chunks.push(current);
        current = '';
    };

    for (const line of text.split('\n')) {
        const candidate = current ? `${current}\n${line}` : line;
        if (candidate.length <= limit) {
            current = candidate;
            continue;
        }

        flush();
        let rest = line;
        while (rest.length > limit) {
            chunks.push(rest.slice(0, limit));
            rest = rest.slice(limit);
        }
        current = rest;
    }
    flush();

    return chunks;
}

/**
 * Default renderer: an HTML post with a header (mapping label, kind, thread
 * title, author), the text, embeds, non-image attachments and an optional
 * link back to the source. Image attachments travel as `imageUrls`.
 */
export const renderMessage: RenderFn = (message, mapping, kind, context = {}) => {
    const { formatting } = mapping;

    const header: string[] = [];
    if (mapping.label) header.push(`📣 <b>${escapeHtml(mapping.label)}</b>`);
    header.push(KIND_HEADINGS[kind]);
    if (context.threadTitle) header.push(`🧵 <b>${escapeHtml(context.threadTitle)}</b>`);
    if (message.authorName) header.push(`👤 <b>${escapeHtml(message.authorName)}</b>`);

    const blocks: string[] = [header.join('\n')];
    const content = message.content.trim();
    if (content) blocks.push(escapeHtml(content));

    for (const embed of message.embeds) {
        const rendered = renderEmbed(embed);
        if (rendered) blocks.push(rendered);
    }

    const withUrl = message.attachments.filter((attachment) => attachmentUrl(attachment).length > 0);
    const imageUrls = withUrl.filter(isImage).map(attachmentUrl);
    const files = renderAttachments(
        withUrl.filter((attachment) => !isImage(attachment)),
        formatting.attachmentsStyle,
    );
    if (files) blocks.push(files);

    if (formatting.showSourceLink) {
        blocks.push(`🔗 ${escapeHtml(sourceLink(message))}`);
    }

    const chunks = chunkText(blocks.join('\n\n'), formatting.maxLength);
    const payload: OutboundPayload = {
        text: chunks[0] ?? '',
        extraMessages: chunks.slice(1),
        parseMode: 'HTML',
        disablePreview: formatting.disablePreview,
        imageUrls,
    };
    return payload;
};
