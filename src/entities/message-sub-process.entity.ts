import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Message } from './message.entity';

@Entity('message_sub_processes')
export class MessageSubProcess {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  messageId!: string;

  @Column({ type: 'varchar', length: 64 })
  source!: string;

  @Column()
  eventId!: string;

  @Column({ default: false })
  hasEnded!: boolean;

  @Column('json', { nullable: true })
  metadataMap!: Record<string, unknown> | null;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Message, message => message.subProcesses, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'messageId' })
  message!: Message;
}
