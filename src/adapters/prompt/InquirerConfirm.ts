import inquirer from "inquirer";
import type { ConfirmPort } from "../../domain/ports/ConfirmPort";

export class InquirerConfirm implements ConfirmPort {
  async confirm(message: string): Promise<boolean> {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: "confirm",
        name: "confirm",
        message,
        default: false,
      },
    ]);
    return confirm;
  }
}
