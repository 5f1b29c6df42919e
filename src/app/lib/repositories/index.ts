export * from '@/app/lib/repositories/types';
export { createRepositories, DrizzleUnitOfWork } from '@/app/lib/repositories/unit-of-work';
export { CONSTRAINTS, translateUniqueViolation, uniqueViolationConstraint } from '@/app/lib/repositories/pg-errors';
