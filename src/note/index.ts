export { render, formatHeadingDate, formatDateStamp } from './render';
export type { NoteContent } from './render';
export { create, NoteWriteError } from './writer';
export type { NoteWriter, WriterConfig } from './writer';
