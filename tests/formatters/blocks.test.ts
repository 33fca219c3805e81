import { describe, it, expect } from 'vitest';
import { header, section, context, statusEmoji, ephemeral } from '../../src/formatters/blocks.js';

describe('block builders', () => {
  describe('header', () => {
    it('should create a plain text header with emoji enabled', () => {
      expect(header('Extensions')).toEqual({
        type: 'header',
        text: { type: 'plain_text', text: 'Extensions', emoji: true },
      });
    });
  });

  describe('section', () => {
    it('should create a markdown section', () => {
      expect(section('*bold*')).toEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: '*bold*' },
      });
    });
  });

  describe('context', () => {
    it('should create one markdown element per line', () => {
      expect(context('first', 'second')).toEqual({
        type: 'context',
        elements: [
          { type: 'mrkdwn', text: 'first' },
          { type: 'mrkdwn', text: 'second' },
        ],
      });
    });
  });

  describe('statusEmoji', () => {
    it.each([
      ['loaded', ':large_green_circle:'],
      ['disabled', ':white_circle:'],
      ['failed', ':red_circle:'],
      ['duplicate', ':large_yellow_circle:'],
    ] as const)('should show %s as %s', (status, emoji) => {
      expect(statusEmoji(status)).toBe(emoji);
    });
  });

  describe('ephemeral', () => {
    it('should wrap blocks in a reply only the caller sees', () => {
      const blocks = [section('hello')];

      expect(ephemeral(blocks)).toEqual({ response_type: 'ephemeral', blocks });
    });
  });
});
