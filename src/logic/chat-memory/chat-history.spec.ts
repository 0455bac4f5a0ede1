import { MessageRole, MessageStatus } from '../../entities';
import { getChatHistory, HistorySource } from './chat-history';

const at = (seconds: number) => new Date(Date.UTC(2024, 0, 1, 0, 0, seconds));

describe('getChatHistory', () => {
  const messages: HistorySource[] = [
    { role: MessageRole.ASSISTANT, content: 'Revenue was 10M.', status: MessageStatus.SUCCESS, createdAt: at(2) },
    { role: MessageRole.USER, content: 'What was revenue?', status: MessageStatus.SUCCESS, createdAt: at(1) },
    { role: MessageRole.ASSISTANT, content: 'partial', status: MessageStatus.ERROR, createdAt: at(3) },
    { role: MessageRole.USER, content: '   ', status: MessageStatus.SUCCESS, createdAt: at(4) },
    { role: MessageRole.ASSISTANT, content: 'thinking', status: MessageStatus.PENDING, createdAt: at(5) },
  ];

  it('keeps successful non-blank messages in creation order', () => {
    expect(getChatHistory(messages)).toEqual([
      { role: 'user', content: 'What was revenue?' },
      { role: 'assistant', content: 'Revenue was 10M.' },
    ]);
  });

  it('does not depend on input order', () => {
    expect(getChatHistory([...messages].reverse())).toEqual(getChatHistory(messages));
  });

  it('keeps input order for equal timestamps', () => {
    const same = at(9);
    expect(
      getChatHistory([
        { role: MessageRole.USER, content: 'first', status: MessageStatus.SUCCESS, createdAt: same },
        { role: MessageRole.ASSISTANT, content: 'second', status: MessageStatus.SUCCESS, createdAt: same },
      ]).map(message => message.content),
    ).toEqual(['first', 'second']);
  });
});
