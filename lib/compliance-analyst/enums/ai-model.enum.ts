export enum AIModelEnum {
  GPT_4O = 'gpt-4o',
}
