import { NullableType } from '../../../utils/types/nullable.type';
import { DataSource } from '../entities/data-source.entity';

export abstract class DataSourceRepository {
  abstract findById(id: DataSource['id']): Promise<NullableType<DataSource>>;

  /**
   * Return the data source with the given id, creating it if missing.
   * An existing row is returned as stored (never updated).
   */
  abstract getOrCreate(data: DataSource): Promise<DataSource>;
}
