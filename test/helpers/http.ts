import { AxiosHeaders, AxiosResponse } from "axios";

export const axiosResponse = <T>(data: T, status: number = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: status === 200 ? "OK" : "Error",
  headers: {},
  config: { headers: new AxiosHeaders() },
});
