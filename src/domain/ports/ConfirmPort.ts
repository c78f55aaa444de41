export interface ConfirmPort {
  confirm(message: string): Promise<boolean>;
}
