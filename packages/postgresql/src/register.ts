import { registerDialect } from '@clausekit/core';

import { PostgreSQLDialect } from './dialect/postgresql-dialect';

// Auto-register PostgreSQL dialect
registerDialect(['postgresql', 'postgres'], (options) => new PostgreSQLDialect(options));

export { PostgreSQLDialect };
