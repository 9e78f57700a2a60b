export {
  ReflectionDumpSchema,
  ClassDescriptorSchema,
  MemberDescriptorSchema,
  EnumDescriptorSchema,
  parseReflectionDump,
  parseReflectionDumpJson,
  tagNames,
  securityLevels
} from './ReflectionDump';
export type {
  ReflectionDump,
  ClassDescriptor,
  MemberDescriptor,
  EnumDescriptor,
  Security
} from './ReflectionDump';
