import { Entity, PrimaryColumn, Column, Check, ManyToOne, JoinColumn } from 'typeorm';
import { PromptTemplate } from './prompt-template.model';

/** Id of the only row `app_settings` may hold. */
export const APP_SETTINGS_ID = 1;

@Entity('app_settings')
@Check('CHK_app_settings_singleton', `"id" = ${APP_SETTINGS_ID}`)
export class AppSettings {
  @PrimaryColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'active_template_id', type: 'integer', nullable: true })
  activeTemplateId!: number | null;

  // RESTRICT: the template service moves the pointer before deleting
  @ManyToOne(() => PromptTemplate, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'active_template_id' })
  activeTemplate?: PromptTemplate | null;
}
