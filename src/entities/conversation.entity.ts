import { Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, OneToMany, ManyToMany, JoinTable } from 'typeorm';
import { Message } from './message.entity';
import { Document } from './document.entity';

@Entity('conversations')
export class Conversation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @ManyToMany(() => Document, document => document.conversations)
  @JoinTable({
    name: 'conversation_documents',
    joinColumn: { name: 'conversationId' },
    inverseJoinColumn: { name: 'documentId' },
  })
  documents!: Document[];

  @OneToMany(() => Message, message => message.conversation)
  messages!: Message[];
}
