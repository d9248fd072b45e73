export type {
  CaptionReference,
  MatchLineInfo,
  Reference,
} from './caption-reference';
export type { ParagraphRecord } from './paragraph-record';
