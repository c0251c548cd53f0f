import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

@Entity('word_cache')
export class WordCacheEntry {
  @PrimaryColumn({ type: 'varchar', length: 100 })
  word!: string;

  @Column({ type: 'text' })
  analysis!: string;

  // Written by WordCacheService.put on every insert and overwrite
  @Index()
  @Column({ name: 'timestamp', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
