import { parseArgs } from 'util';
import { pool } from '../connections';
import { usersService } from '../modules/services';
import { setupSchema } from '../modules/users/users.validation';
import { AppError } from '../utils/errors';
import { errorMeta, logger } from '../utils/logging';

/**
 * Create the first administrator from the command line:
 *
 *   npm run create-admin -- --username boss --email boss@example.com --password '...' [--full-name 'Boss']
 *
 * Same rules as POST /api/setup: refused once any user exists.
 */
export const createAdmin = async (argv: string[]) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      username: { type: 'string' },
      email: { type: 'string' },
      password: { type: 'string' },
      'full-name': { type: 'string' },
    },
  });

  const input = setupSchema.parse({
    username: values.username,
    email: values.email,
    password: values.password,
    full_name: values['full-name'],
  });

  const user = await usersService.bootstrapAdmin(input);
  logger.info(`Administrator '${user.username}' created`, { userId: user.id });
};

if (require.main === module) {
  void createAdmin(process.argv.slice(2))
    .catch((error: unknown) => {
      if (error instanceof AppError) {
        logger.warn(`Admin not created: ${error.message}`);
      } else {
        logger.error('Admin creation failed', errorMeta(error));
      }
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
