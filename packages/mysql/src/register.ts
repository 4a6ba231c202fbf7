import { registerDialect } from '@clausekit/core';

import { MySQLDialect } from './dialect/mysql-dialect';

// Auto-register MySQL dialect
registerDialect(['mysql', 'mariadb'], (options) => new MySQLDialect(options));

export { MySQLDialect };
