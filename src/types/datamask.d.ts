declare module 'datamask' {
  interface DataMask {
    /** `maskChar` repeated over `value`, at most `maxLength` long */
    string(value: string, maskChar?: string, maxLength?: number): string;
    email(value: string): string;
  }

  const datamask: DataMask;
  export = datamask;
}
