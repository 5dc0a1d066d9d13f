import { describe, expect, it, vi } from 'vitest';
import type { TelegramSendApi } from '../../src/interfaces/telegram-sink.js';
import { TelegramSink } from '../../src/interfaces/telegram-sink.js';
import type { OutboundPayload } from '../../src/types/relay.js';

function makeBot() {
  return {
    sendMessage: vi.fn<TelegramSendApi['sendMessage']>(),
    sendPhoto: vi.fn<TelegramSendApi['sendPhoto']>(),
  };
}

function payload(overrides: Partial<OutboundPayload> = {}): OutboundPayload {
  return {
    text: '<b>hello</b>',
    extraMessages: [],
    parseMode: 'HTML',
    disablePreview: true,
    imageUrls: [],
    ...overrides,
  };
}

describe('TelegramSink', () => {
  it('sends the text, its continuation chunks and the images into the topic', async () => {
    const bot = makeBot();
    const sink = new TelegramSink(bot);

    await sink.send(
      '-100500',
      payload({ extraMessages: ['part two'], imageUrls: ['https://cdn.test/a.png'] }),
      77,
    );

    expect(bot.sendMessage.mock.calls).toEqual([
      ['-100500', '<b>hello</b>', { message_thread_id: 77, disable_web_page_preview: true, parse_mode: 'HTML' }],
      ['-100500', 'part two', { message_thread_id: 77, disable_web_page_preview: true, parse_mode: 'HTML' }],
    ]);
    expect(bot.sendPhoto).toHaveBeenCalledWith('-100500', 'https://cdn.test/a.png', { message_thread_id: 77 });
  });

  it('omits the topic and parse mode when they are not set', async () => {
    const bot = makeBot();
    const sink = new TelegramSink(bot);

    await sink.send('42', payload({ parseMode: null, disablePreview: false }), null);

    expect(bot.sendMessage).toHaveBeenCalledWith('42', '<b>hello</b>', { disable_web_page_preview: false });
  });

  it('sends only images for a payload without text', async () => {
    const bot = makeBot();
    const sink = new TelegramSink(bot);

    await sink.send('42', payload({ text: '', imageUrls: ['https://cdn.test/a.png'] }), null);

    expect(bot.sendMessage).not.toHaveBeenCalled();
    expect(bot.sendPhoto).toHaveBeenCalledWith('42', 'https://cdn.test/a.png', {});
  });

  it('propagates delivery errors', async () => {
    const bot = makeBot();
    bot.sendMessage.mockRejectedValue(new Error('Forbidden: bot was blocked by the user'));
    const sink = new TelegramSink(bot);

    await expect(sink.send('42', payload(), null)).rejects.toThrow('Forbidden: bot was blocked by the user');
    expect(bot.sendPhoto).not.toHaveBeenCalled();
  });
});
