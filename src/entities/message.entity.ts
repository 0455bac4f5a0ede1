import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, OneToMany, JoinColumn, Index } from 'typeorm';
import { Conversation } from './conversation.entity';
import { MessageSubProcess } from './message-sub-process.entity';

export enum MessageRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}

export enum MessageStatus {
  PENDING = 'PENDING',
  SUCCESS = 'SUCCESS',
  ERROR = 'ERROR',
}

@Entity('messages')
@Index(['conversationId', 'createdAt'])
export class Message {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  conversationId!: string;

  @Column({ type: 'varchar', length: 16 })
  role!: MessageRole;

  @Column('text')
  content!: string;

  @Column({ type: 'varchar', length: 16, default: MessageStatus.PENDING })
  status!: MessageStatus;

  @CreateDateColumn({ precision: 3 })
  createdAt!: Date;

  @ManyToOne(() => Conversation, conversation => conversation.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'conversationId' })
  conversation!: Conversation;

  @OneToMany(() => MessageSubProcess, subProcess => subProcess.message)
  subProcesses!: MessageSubProcess[];
}
