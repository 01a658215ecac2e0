export { UpdateQueue } from './update-queue.js';
export { sendGreeting, greetingText, formatTimestamp, type GreetingConfig } from './greeting.js';
