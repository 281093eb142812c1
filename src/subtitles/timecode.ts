const pad = (value: number, size = 2): string => value.toString().padStart(size, "0");

/** `H:MM:SS.cc`, rounded to the nearest centisecond. */
export const toAssTimestamp = (sec: number): string => {
  const totalCs = Math.max(0, Math.round(sec * 100));
  const hours = Math.floor(totalCs / 360_000);
  const minutes = Math.floor((totalCs % 360_000) / 6_000);
  const seconds = Math.floor((totalCs % 6_000) / 100);
  const centiseconds = totalCs % 100;
  return `${hours}:${pad(minutes)}:${pad(seconds)}.${pad(centiseconds)}`;
};

/** `HH:MM:SS,mmm`, rounded to the nearest millisecond. */
export const toSrtTimestamp = (sec: number): string => {
  const totalMs = Math.max(0, Math.round(sec * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const milliseconds = totalMs % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)},${pad(milliseconds, 3)}`;
};
