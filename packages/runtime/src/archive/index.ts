export {
  createArchiveForwarder,
  type ArchiveForwarder,
  type ArchiveForwarderOptions,
} from './forwarder.js';
