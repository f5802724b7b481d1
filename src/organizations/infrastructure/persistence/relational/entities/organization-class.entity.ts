import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DataSourceEntity } from './data-source.entity';

@Entity({
  name: 'organization_classes',
})
@Unique('organization_classes_data_source_and_origin_id_unique', [
  'dataSourceId',
  'originId',
])
export class OrganizationClassEntity extends EntityRelationalHelper {
  @PrimaryColumn({ type: 'varchar', length: 255 })
  id!: string;

  @ManyToOne(() => DataSourceEntity, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'data_source_id' })
  dataSource?: DataSourceEntity | null;

  @Column({ name: 'data_source_id', type: 'varchar', length: 100, nullable: true })
  @Index()
  dataSourceId!: string | null;

  @Column({ name: 'origin_id', type: 'varchar', length: 255, default: '' })
  originId!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @CreateDateColumn({ name: 'created_time' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'last_modified_time' })
  updatedAt!: Date;
}
