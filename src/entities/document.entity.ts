import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToMany } from 'typeorm';
import { Conversation } from './conversation.entity';

export enum DocumentMetadataKey {
  SEC_DOCUMENT = 'sec_document',
}

export type DocumentMetadataMap = Partial<Record<DocumentMetadataKey, Record<string, unknown>>>;

@Entity('documents')
export class Document {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  url!: string;

  // sec_document -> { company_name, company_ticker, doc_type, year, quarter }
  @Column('json', { nullable: true })
  metadataMap!: DocumentMetadataMap | null;

  @ManyToMany(() => Conversation, conversation => conversation.documents)
  conversations!: Conversation[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
