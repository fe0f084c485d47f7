import { AlertType } from '../../entities/alert.entity';

export interface AlertConfig {
  enabled: boolean;
  emailEnabled: boolean;
  emailRecipients: string[];
  cooldownMinutes: Record<AlertType, number>;
}
