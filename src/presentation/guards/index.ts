export { JSON_MEDIA_TYPE, JsonContentTypeGuard } from './json-content-type.guard';
