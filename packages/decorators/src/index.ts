/**
 * Optional decorator-based discovery of exported members
 */

export {
  Export,
  EXPORT_METADATA_KEY,
  EXPORTED_MEMBERS_KEY,
  getExportOptions,
  getExportedMembers,
  getOwnExportedMembers,
} from './decorators';
export type { ExportOptions } from './decorators';

export {
  exportObject,
  exportClass,
  exportMember,
  exportStaticMember,
  locateInstanceExports,
  locateStaticExports,
} from './locator';
export type { ExportableClass, ExportMemberOptions } from './locator';

export { resolveMember, isStaticMember } from './members';
export type { MemberKind, ResolvedMember } from './members';
