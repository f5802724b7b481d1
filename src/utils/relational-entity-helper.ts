import { BaseEntity } from 'typeorm';

export class EntityRelationalHelper extends BaseEntity {}
