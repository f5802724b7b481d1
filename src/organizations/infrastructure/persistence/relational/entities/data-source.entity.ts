import { Column, Entity, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'data_sources',
})
export class DataSourceEntity extends EntityRelationalHelper {
  @PrimaryColumn({ type: 'varchar', length: 100 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({
    name: 'user_editable_organizations',
    type: 'boolean',
    default: false,
  })
  userEditableOrganizations!: boolean;
}
