export { Video, type IVideo } from './Video.js';
export {
  SITE_NAME,
  defaultDescription,
  parseHashtags,
  resolveDescription,
  resolvePlayerUrl,
  toVideoView,
  type NewVideoRecord,
  type VideoChanges,
  type VideoRecord,
  type VideoView,
} from './video-record.js';
export {
  MAX_TITLE_LENGTH,
  isHttpUrl,
  parseVideoForm,
  videoFormSchema,
  type VideoFields,
  type VideoFormInput,
} from './video.schema.js';
