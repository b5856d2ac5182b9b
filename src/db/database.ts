import { Options, Sequelize } from 'sequelize';
import winston from 'winston';
import { initPostModels, PostModels } from './models';

export interface Database {
  sequelize: Sequelize;
  models: PostModels;
}

// Driver overrides; tests hand in an in-memory postgres driver here.
export type DriverOptions = Pick<Options, 'dialectModule' | 'databaseVersion'>;

export const createDatabase = (
  databaseUrl: string,
  loggerInstance: winston.Logger,
  driverOptions: DriverOptions = {}
): Database => {
  const sequelize = new Sequelize(databaseUrl, {
    ...driverOptions,
    logging: (sql: string) => loggerInstance.debug('Database: statement executed', { sql, type: 'DBLog.Statement' }),
  });
  const models = initPostModels(sequelize);
  loggerInstance.info('Database: models initialised', { dialect: sequelize.getDialect(), type: 'DBLog.Init' });
  return { sequelize, models };
};

export const connectDatabase = async (database: Database, loggerInstance: winston.Logger): Promise<void> => {
  await database.sequelize.authenticate();
  loggerInstance.info('Database: connection established', { dialect: database.sequelize.getDialect(), type: 'DBLog.Connected' });
};

export const syncDatabase = async (database: Database, loggerInstance: winston.Logger): Promise<void> => {
  await database.sequelize.sync();
  loggerInstance.info('Database: schema synchronised', { type: 'DBLog.Synced' });
};

export const closeDatabase = async (database: Database, loggerInstance: winston.Logger): Promise<void> => {
  await database.sequelize.close();
  loggerInstance.info('Database: connection pool closed', { type: 'DBLog.Closed' });
};
