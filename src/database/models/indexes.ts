import { Collection, CreateIndexesOptions, Document, IndexSpecification } from 'mongodb';
import logger from '../../common/logger.js';

export interface IndexDefinition {
  keys: IndexSpecification;
  options?: CreateIndexesOptions;
  description: string;
}

export const ensureIndexes = async <T extends Document>(
  collection: Collection<T>,
  modelName: string,
  indexDefinitions: IndexDefinition[],
): Promise<void> => {
  for (const def of indexDefinitions) {
    try {
      await collection.createIndex(def.keys, def.options);
      logger.info(`Created ${modelName} index successfully: ${def.description}`);
    } catch (error) {
      logger.error(
        error,
        `${modelName} index creation failed (may already exist): ${def.description}`,
      );
    }
  }
};
