import { Actor, Topic } from '../types';

export function buildOriginatePrompt(actor: Actor): string {
  return (
    `You are ${actor.name}, ${actor.style}. ` +
    'Create an interesting discussion topic for our community. Keep it to 1-2 sentences.'
  );
}

/**
 * Reply prompt carrying the whole thread: the topic, then every earlier reply
 * numbered in the order it was posted.
 */
export function buildReplyPrompt(actor: Actor, topic: Topic): string {
  let context = `Original Topic: ${topic.title}\n\n${topic.body}`;

  if (topic.replies.length > 0) {
    context += '\n\nPrevious Replies:\n';
    topic.replies.forEach((reply, i) => {
      context += `${i + 1}. ${reply.author}: ${reply.content}\n`;
    });
  }

  return (
    `You are ${actor.name}, ${actor.style}. Here is the ongoing discussion:\n\n${context}\n\n` +
    'Please provide a thoughtful reply that adds value to this conversation. ' +
    'Keep your response to 1-2 sentences.'
  );
}

/**
 * Shorten text for log lines
 */
export function preview(text: string, max = 50): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : `${chars.slice(0, max).join('')}...`;
}
