import { describe, expect, it } from 'vitest';
import { chunkText, escapeHtml, renderMessage } from '../../src/services/formatting.js';
import { DEFAULT_FORMATTING } from '../../src/types/relay.js';
import { makeMapping, makeMessage } from '../helpers/fixtures.js';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
  });
});

describe('chunkText', () => {
  it('splits on line boundaries and cuts lines longer than the limit', () => {
    expect(chunkText('aaaa\nbb\ncccccc', 5)).toEqual(['aaaa', 'bb', 'ccccc', 'c']);
  });

  it('keeps short text in one chunk', () => {
    expect(chunkText('one\ntwo', 100)).toEqual(['one\ntwo']);
  });
});

describe('renderMessage', () => {
  it('renders header and escaped content as HTML', () => {
    const payload = renderMessage(makeMessage({ content: 'a < b' }), makeMapping({ label: 'News' }), 'message');

    expect(payload).toEqual({
      text: '📣 <b>News</b>\n💬 <b>New message</b>\n👤 <b>Alice</b>\n\na &lt; b',
      extraMessages: [],
      parseMode: 'HTML',
      disablePreview: true,
      imageUrls: [],
    });
  });

  it('adds the thread title for forum threads', () => {
    const payload = renderMessage(makeMessage({ content: 'first post' }), makeMapping(), 'forum_thread', {
      threadTitle: 'Launch',
    });

    expect(payload.text).toBe('🧵 <b>New forum thread</b>\n🧵 <b>Launch</b>\n👤 <b>Alice</b>\n\nfirst post');
  });

  it('sends images separately and summarizes other attachments', () => {
    const message = makeMessage({
      content: '',
      attachments: [
        { filename: 'pic.png', url: 'https://cdn.test/pic.png' },
        { filename: 'doc.pdf', url: 'https://cdn.test/doc.pdf', contentType: 'application/pdf' },
      ],
      embeds: [{ title: 'T', description: 'D', url: 'https://embed.test' }],
    });

    const payload = renderMessage(message, makeMapping(), 'pinned');

    expect(payload.imageUrls).toEqual(['https://cdn.test/pic.png']);
    expect(payload.text).toBe(
      [
        '📌 <b>Pinned message</b>\n👤 <b>Alice</b>',
        'T\nD\nhttps://embed.test',
        '📎 <b>Attachments</b>\n• doc.pdf • application/pdf • https://cdn.test/doc.pdf',
      ].join('\n\n'),
    );
  });

  it('lists attachment links and the source link when configured', () => {
    const mapping = makeMapping({
      formatting: { ...DEFAULT_FORMATTING, attachmentsStyle: 'links', showSourceLink: true, disablePreview: false },
    });
    const message = makeMessage({
      id: '42',
      content: 'see file',
      attachments: [{ filename: 'doc.pdf', url: 'https://cdn.test/doc.pdf' }],
    });

    const payload = renderMessage(message, mapping, 'message');

    expect(payload.disablePreview).toBe(false);
    expect(payload.text).toBe(
      [
        '💬 <b>New message</b>\n👤 <b>Alice</b>',
        'see file',
        '🔗 <b>Attachment links</b>\n• doc.pdf: https://cdn.test/doc.pdf',
        '🔗 https://discord.com/channels/guild-1/chan-1/42',
      ].join('\n\n'),
    );
  });

  it('moves overflow into extra messages', () => {
    const mapping = makeMapping({ formatting: { ...DEFAULT_FORMATTING, maxLength: 30 } });
    const payload = renderMessage(makeMessage({ content: 'line one\nline two' }), mapping, 'message');

    expect(payload.text).toBe('💬 <b>New message</b>');
    expect(payload.extraMessages).toEqual(['👤 <b>Alice</b>\n\nline one', 'line two']);
  });
});
