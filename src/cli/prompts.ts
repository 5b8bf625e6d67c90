import inquirer from 'inquirer';

interface ConfirmAnswers {
  proceed: boolean;
}

export const confirmOperation = async (message: string): Promise<boolean> => {
  const answers = await inquirer.prompt<ConfirmAnswers>([
    {
      type: 'confirm',
      name: 'proceed',
      message,
      default: false,
    },
  ]);

  return answers.proceed;
};
