export * from './lib/messages';
export * from './lib/parser/prefix';
export * from './lib/parser/parse-error';
export * from './lib/parser/argument-tokenizer';
export * from './lib/parser/parser-util';
export * from './lib/parser/command-parser';
export * from './lib/commands/command';
export * from './lib/commands/command-error';
export * from './lib/commands/command-usage';
export * from './lib/commands/edit-descriptor';
export * from './lib/commands/execute-command';
export * from './lib/commands/format-command-result';
export * from './lib/logic.service';
export * from './lib/logic.factory';
