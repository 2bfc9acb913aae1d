export type { Marshaller, FormatName, Document } from './marshaller';
export { FORMAT_NAMES, isDocument, isFormatName } from './marshaller';
export {
  TOML_MARSHALLER,
  JSON_MARSHALLER,
  YAML_MARSHALLER,
  MSGPACK_MARSHALLER,
  KNOWN_MARSHALLERS,
  marshallerByName,
  marshallerByExtension,
} from './marshallers';
