import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToOne,
  PrimaryColumn,
  Tree,
  TreeChildren,
  TreeParent,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { OrganizationInternalType } from '../../../../domain/enums/organization-internal-type.enum';
import { DataSourceEntity } from './data-source.entity';
import { OrganizationClassEntity } from './organization-class.entity';

// Closure table: ids contain ':' and '.' freely, which a materialized path cannot hold
@Entity({
  name: 'organizations',
})
@Tree('closure-table')
@Unique('organizations_data_source_and_origin_id_unique', [
  'dataSourceId',
  'originId',
])
export class OrganizationEntity extends EntityRelationalHelper {
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

  @Column({ type: 'varchar', length: 50, nullable: true })
  abbreviation!: string | null;

  @ManyToOne(() => OrganizationClassEntity, {
    nullable: true,
    onDelete: 'RESTRICT',
  })
  @JoinColumn({ name: 'classification_id' })
  classification?: OrganizationClassEntity | null;

  @Column({
    name: 'classification_id',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  classificationId!: string | null;

  @Column({ name: 'founding_date', type: 'date', nullable: true })
  foundingDate!: string | null;

  @Column({ name: 'dissolution_date', type: 'date', nullable: true })
  dissolutionDate!: string | null;

  @Column({
    name: 'internal_type',
    type: 'varchar',
    length: 20,
    default: OrganizationInternalType.NORMAL,
  })
  internalType!: OrganizationInternalType;

  @TreeParent({ onDelete: 'CASCADE' })
  @JoinColumn({ name: 'parent_id' })
  parent?: OrganizationEntity | null;

  @Column({ name: 'parent_id', type: 'varchar', length: 255, nullable: true })
  @Index()
  parentId!: string | null;

  @TreeChildren()
  children?: OrganizationEntity[];

  @Column({ name: 'sibling_order', type: 'integer', default: 0 })
  siblingOrder!: number;

  @OneToOne(() => OrganizationEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'replaced_by_id' })
  replacedBy?: OrganizationEntity | null;

  @Column({
    name: 'replaced_by_id',
    type: 'varchar',
    length: 255,
    nullable: true,
    unique: true,
  })
  replacedById!: string | null;

  @CreateDateColumn({ name: 'created_time' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'last_modified_time' })
  updatedAt!: Date;
}
