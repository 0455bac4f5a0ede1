export * from './conversation.entity';
export * from './document.entity';
export * from './message.entity';
export * from './message-sub-process.entity';
