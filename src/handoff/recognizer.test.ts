import { describe, it, expect } from 'vitest';
import { createKeywordHandoffRecognizer, DEFAULT_HANDOFF_RECOGNIZER_CONFIG } from './recognizer.js';
import { createImportedMessage } from '@/testing/fixtures/engage.js';

function message(text: string) {
  return createImportedMessage({ text });
}

describe('createKeywordHandoffRecognizer', () => {
  const recognizer = createKeywordHandoffRecognizer();

  describe('agent requests', () => {
    it('detects English phrases', async () => {
      expect(await recognizer.recognizeHandoffRequest(message('Can I talk to a human please?'))).toBe('agent');
      expect(await recognizer.recognizeHandoffRequest(message('I want a real person'))).toBe('agent');
    });

    it('detects Spanish phrases', async () => {
      expect(await recognizer.recognizeHandoffRequest(message('quiero hablar con humano'))).toBe('agent');
      expect(await recognizer.recognizeHandoffRequest(message('necesito un operador'))).toBe('agent');
    });

    it('ignores case and extra whitespace', async () => {
      expect(await recognizer.recognizeHandoffRequest(message('  TALK   to A\nHuman '))).toBe('agent');
    });
  });

  describe('bot requests', () => {
    it('detects return-to-bot phrases', async () => {
      expect(await recognizer.recognizeHandoffRequest(message('ok, back to the bot'))).toBe('bot');
      expect(await recognizer.recognizeHandoffRequest(message('Volver al bot'))).toBe('bot');
    });

    it('prefers agent when both lists match', async () => {
      expect(
        await recognizer.recognizeHandoffRequest(message('not back to the bot, talk to a human')),
      ).toBe('agent');
    });
  });

  describe('no request', () => {
    it('returns none for ordinary messages', async () => {
      expect(await recognizer.recognizeHandoffRequest(message('What are your opening hours?'))).toBe('none');
    });

    it('returns none for messages without text', async () => {
      expect(await recognizer.recognizeHandoffRequest(createImportedMessage({ text: undefined }))).toBe('none');
    });

    it('returns none for non-message activities', async () => {
      const typing = createImportedMessage({ type: 'typing', text: 'talk to a human' });
      expect(await recognizer.recognizeHandoffRequest(typing)).toBe('none');
    });
  });

  describe('custom keywords', () => {
    it('uses only the configured lists', async () => {
      const custom = createKeywordHandoffRecognizer({ agentKeywords: ['SUPPORT PLEASE'], botKeywords: ['robot'] });

      expect(await custom.recognizeHandoffRequest(message('support please'))).toBe('agent');
      expect(await custom.recognizeHandoffRequest(message('robot again'))).toBe('bot');
      expect(await custom.recognizeHandoffRequest(message('talk to a human'))).toBe('none');
    });

    it('rejects empty keywords', () => {
      expect(() =>
        createKeywordHandoffRecognizer({ ...DEFAULT_HANDOFF_RECOGNIZER_CONFIG, botKeywords: [''] }),
      ).toThrow();
    });
  });
});
